import { Bot, GrammyError } from "grammy";
import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import type { ConversationRouter } from "../bus/router.js";
import type { Replies } from "../bus/replies.js";
import type { Channel } from "./base.js";
import { errorMessage } from "../observability/logger.js";

type ParseMode = "Markdown" | "MarkdownV2" | "HTML";

const isEntityParseError = (error: unknown) =>
  error instanceof GrammyError &&
  error.error_code === 400 &&
  /can't parse entities/i.test(error.description);

export class TelegramChannel implements Channel {
  readonly name = "telegram";
  private logger: Logger | null = null;
  private running: Promise<void> | null = null;
  private readonly bot: Bot;

  constructor(
    private config: Config,
    private replies: Replies,
    bot?: Bot
  ) {
    const token = config.telegram.botToken?.trim();
    if (!bot && !token) {
      throw new Error("Telegram channel requires TELEGRAM_BOT_TOKEN.");
    }
    this.bot = bot ?? new Bot(token ?? "");
  }

  async start(router: ConversationRouter, logger: Logger) {
    this.logger = logger;
    if (this.running) {
      return;
    }

    // Not awaited; per-chat ordering is kept by the router's queues.
    this.bot.on("message:text", (ctx) => {
      const userId = ctx.from?.id;
      if (userId === undefined) {
        return;
      }
      const chatId = ctx.chat.id;
      router.handleInbound({ chatId, userId, text: ctx.message.text }).catch((error: unknown) => {
        logger.error({ chatId, error: errorMessage(error) }, "inbound handling failed");
      });
    });

    this.bot.catch((error) => {
      logger.error(
        { updateId: error.ctx.update.update_id, error: errorMessage(error.error) },
        "telegram handler error"
      );
    });

    await this.bot.api.setMyCommands([
      {
        command: "model",
        description: this.replies.modelCommandDescription(this.config.provider.model)
      },
      { command: "reset", description: this.replies.resetCommandDescription }
    ]);

    this.running = this.bot.start({
      drop_pending_updates: false,
      onStart: (info) => {
        logger.info({ username: info.username }, "telegram channel polling");
      }
    });
    this.running.catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, "telegram polling stopped with error");
    });
  }

  async stop() {
    if (!this.running) {
      return;
    }
    await this.bot.stop();
    this.running = null;
  }

  async send(message: { chatId: number; content: string; formatted?: boolean }) {
    const parseMode = this.resolveParseMode(message.formatted ?? false);
    if (!parseMode) {
      await this.bot.api.sendMessage(message.chatId, message.content);
      return;
    }
    try {
      await this.bot.api.sendMessage(message.chatId, message.content, { parse_mode: parseMode });
    } catch (error) {
      if (!isEntityParseError(error)) {
        throw error;
      }
      this.logger?.warn(
        { chatId: message.chatId, parseMode },
        "markup rejected by telegram; resending as plain text"
      );
      await this.bot.api.sendMessage(message.chatId, message.content);
    }
  }

  async sendTyping(chatId: number) {
    await this.bot.api.sendChatAction(chatId, "typing");
  }

  private resolveParseMode(formatted: boolean): ParseMode | undefined {
    const mode = this.config.telegram.parseMode;
    if (!formatted || mode === "none") {
      return undefined;
    }
    return mode;
  }
}
