import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import type { TurnResult } from "../types.js";
import type { ConversationSession } from "../session/store.js";
import type { RuntimeTelemetry } from "../observability/telemetry.js";
import type { CompletionClient } from "./provider.js";
import type { HistoryCompactor } from "./compact.js";
import { linearBackoff, withRetry } from "./retry.js";

export type AgentRuntimeOptions = {
  client: CompletionClient;
  compactor: HistoryCompactor;
  config: Config;
  logger: Logger;
  errorTemplate: (message: string) => string;
  telemetry?: RuntimeTelemetry;
  sleep?: (ms: number) => Promise<void>;
};

export class AgentRuntime {
  constructor(private options: AgentRuntimeOptions) {}

  async answer(session: ConversationSession, userText: string): Promise<TurnResult> {
    const { client, compactor, config, logger } = this.options;
    await compactor.remember(session, { role: "user", content: userText });

    const start = Date.now();
    const result = await withRetry(
      () =>
        client.complete({
          model: session.model,
          messages: [...session.messages],
          temperature: config.provider.temperature,
          maxTokens: config.provider.maxTokens,
          n: config.provider.choices,
          presencePenalty: config.provider.presencePenalty,
          frequencyPenalty: config.provider.frequencyPenalty
        }),
      {
        maxAttempts: config.retry.maxAttempts,
        backoffMs: linearBackoff(config.retry.delayUnitMs),
        sleep: this.options.sleep,
        onError: (error, attempt) => {
          logger.warn(
            { chatId: session.chatId, model: session.model, attempt: attempt + 1, error: error.message },
            "completion attempt failed"
          );
        }
      }
    );

    const firstChoice = result.ok ? result.value.choices[0] : undefined;
    if (!result.ok || !firstChoice) {
      const error = result.ok ? new Error("Provider returned no choices.") : result.error;
      this.options.telemetry?.recordCompletion(Date.now() - start, false);
      logger.error(
        { chatId: session.chatId, model: session.model, reason: "CompletionFailure", error: error.message },
        "completion failed"
      );
      return {
        ok: false,
        reason: "CompletionFailure",
        text: this.options.errorTemplate(error.message)
      };
    }

    this.options.telemetry?.recordCompletion(Date.now() - start, true);
    const text = firstChoice.message.content.trim();
    await compactor.remember(session, { role: "assistant", content: text });
    return { ok: true, text };
  }
}
