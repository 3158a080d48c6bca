import type { Logger } from "pino";
import type { ChatMessage } from "../types.js";
import type { CompletionClient } from "./provider.js";
import type { ConversationSession } from "../session/store.js";
import type { RuntimeTelemetry } from "../observability/telemetry.js";
import { linearBackoff, withRetry } from "./retry.js";

export type HistoryCompactorOptions = {
  client: CompletionClient;
  systemInstruction: ChatMessage;
  historySizeLimit: number;
  maxAttempts: number;
  delayUnitMs: number;
  logger: Logger;
  telemetry?: RuntimeTelemetry;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Bounds a session's log by replacing it with a generated summary.
 *
 * The threshold is checked before the new message is appended, so a log can
 * hold `historySizeLimit + 1` entries and compaction fires one turn late.
 */
export class HistoryCompactor {
  constructor(private options: HistoryCompactorOptions) {}

  async remember(session: ConversationSession, message: ChatMessage): Promise<void> {
    if (session.messages.length > this.options.historySizeLimit) {
      await this.compact(session);
    }
    session.messages.push(message);
  }

  private async compact(session: ConversationSession): Promise<void> {
    const { logger } = this.options;
    const messages = [...session.messages];
    const start = Date.now();
    const result = await withRetry(
      () => this.options.client.summarize({ model: session.model, messages }),
      {
        maxAttempts: this.options.maxAttempts,
        backoffMs: linearBackoff(this.options.delayUnitMs),
        sleep: this.options.sleep,
        onError: (error, attempt) => {
          logger.warn(
            { chatId: session.chatId, attempt: attempt + 1, error: error.message },
            "summarization attempt failed"
          );
        }
      }
    );
    this.options.telemetry?.recordSummary(Date.now() - start, result.ok);

    if (!result.ok) {
      logger.error(
        {
          chatId: session.chatId,
          reason: "SummarizationFailure",
          attempts: result.attempts,
          error: result.error.message
        },
        "conversation summary failed; keeping history uncompacted"
      );
      return;
    }

    session.messages = [
      this.options.systemInstruction,
      { role: "assistant", content: result.value }
    ];
    logger.debug(
      { chatId: session.chatId, compactedFrom: messages.length },
      "conversation compacted"
    );
  }
}
