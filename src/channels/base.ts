import type { Logger } from "pino";
import type { ConversationRouter } from "../bus/router.js";

export interface Channel {
  readonly name: string;
  start(router: ConversationRouter, logger: Logger): Promise<void>;
  stop(): Promise<void>;
  /** `formatted` content is rendered with the channel's markup; otherwise it is sent as plain text. */
  send(message: { chatId: number; content: string; formatted?: boolean }): Promise<void>;
  sendTyping?(chatId: number): Promise<void>;
}
