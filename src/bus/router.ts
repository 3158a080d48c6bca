import type { Logger } from "pino";
import type { InboundMessage } from "../types.js";
import type { Config } from "../config/schema.js";
import type { ConversationStore } from "../session/store.js";
import type { AgentRuntime } from "../agent/runtime.js";
import type { Channel } from "../channels/base.js";
import type { RuntimeTelemetry } from "../observability/telemetry.js";
import type { Replies } from "./replies.js";
import { chunkText } from "../channels/chunk.js";
import { isUserAuthorized, toAllowSet } from "../channels/allowlist.js";
import { errorMessage } from "../observability/logger.js";
import { parseCommand, resolveModel, type Command } from "./commands.js";

export type ConversationRouterOptions = {
  store: ConversationStore;
  runtime: AgentRuntime;
  config: Config;
  logger: Logger;
  replies: Replies;
  telemetry?: RuntimeTelemetry;
};

export class ConversationRouter {
  private channel: Channel | null = null;
  private readonly allowedUserIds: ReadonlySet<number>;

  constructor(private options: ConversationRouterOptions) {
    this.allowedUserIds = toAllowSet(options.config.telegram.allowedUserIds);
  }

  attach(channel: Channel) {
    this.channel = channel;
  }

  isAuthorized(userId: number) {
    return isUserAuthorized(this.allowedUserIds, userId);
  }

  /** Entry point for every inbound text; commands are dispatched to `handleCommand`. */
  handleInbound = async (message: InboundMessage): Promise<void> => {
    const command = parseCommand(message.text);
    if (command) {
      await this.handleCommand(message, command);
      return;
    }
    if (!this.checkAuthorized(message)) {
      return;
    }
    this.options.telemetry?.recordTurn();
    await this.options.store.run(message.chatId, async () => {
      const session = this.options.store.getOrCreate(message.chatId);
      await this.sendTyping(message.chatId);
      const result = await this.options.runtime.answer(session, message.text);
      await this.deliver(message.chatId, result.text, result.ok);
    });
  };

  handleCommand = async (message: InboundMessage, command: Command): Promise<void> => {
    if (!this.checkAuthorized(message)) {
      return;
    }
    if (command.name === "unsupported") {
      this.options.logger.debug(
        { chatId: message.chatId, command: command.command },
        "ignoring unsupported command"
      );
      return;
    }
    this.options.telemetry?.recordCommand();
    if (command.name === "reset") {
      await this.options.store.run(message.chatId, async () => {
        if (this.reset(message.chatId)) {
          await this.reply(message.chatId, this.options.replies.conversationReset);
        }
      });
      return;
    }

    const requested = command.argument;
    await this.options.store.run(message.chatId, async () => {
      if (!this.options.store.get(message.chatId)) {
        return;
      }
      const resolved = resolveModel(requested, this.options.config);
      if (!resolved.ok) {
        await this.reply(
          message.chatId,
          this.options.replies.unknownModel(resolved.model, resolved.allowed)
        );
        return;
      }
      this.setModel(message.chatId, resolved.model);
      await this.reply(message.chatId, this.options.replies.modelSet(resolved.model));
    });
  };

  /** Returns false for an unknown chat, which is left uncreated. */
  setModel(chatId: number, model: string): boolean {
    const session = this.options.store.setModel(chatId, model);
    if (session) {
      this.options.logger.info({ chatId, model }, "model changed");
    }
    return session !== undefined;
  }

  reset(chatId: number): boolean {
    const session = this.options.store.reset(chatId);
    if (session) {
      this.options.logger.info({ chatId }, "conversation reset");
    }
    return session !== undefined;
  }

  private checkAuthorized(message: InboundMessage) {
    if (this.isAuthorized(message.userId)) {
      return true;
    }
    this.options.telemetry?.recordUnauthorized();
    this.options.logger.warn(
      { userId: message.userId, chatId: message.chatId, reason: "Unauthorized" },
      "unknown user id"
    );
    return false;
  }

  private async sendTyping(chatId: number) {
    if (!this.channel?.sendTyping) {
      return;
    }
    try {
      await this.channel.sendTyping(chatId);
    } catch (error) {
      this.options.logger.warn({ chatId, error: errorMessage(error) }, "typing indicator failed");
    }
  }

  private async deliver(chatId: number, text: string, formatted: boolean) {
    const chunks = chunkText(text, this.options.config.telegram.chunkSizeLimit);
    let sent = 0;
    try {
      for (const chunk of chunks) {
        await this.send(chatId, chunk, formatted);
        sent += 1;
      }
      this.options.telemetry?.recordDelivery(sent, true);
    } catch (error) {
      this.options.telemetry?.recordDelivery(sent, false);
      this.options.logger.error(
        { chatId, sent, total: chunks.length, error: errorMessage(error) },
        "failed to deliver answer"
      );
    }
  }

  private async reply(chatId: number, text: string) {
    try {
      await this.send(chatId, text, false);
    } catch (error) {
      this.options.logger.error({ chatId, error: errorMessage(error) }, "failed to send reply");
    }
  }

  private async send(chatId: number, content: string, formatted: boolean) {
    if (!this.channel) {
      throw new Error("No channel attached to the router.");
    }
    await this.channel.send({ chatId, content, formatted });
  }
}
