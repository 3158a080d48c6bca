import pino from "pino";
import { ConfigSchema, type Config } from "../src/config/schema.js";
import type { CompletionClient, CompletionRequest, CompletionResponse } from "../src/agent/provider.js";
import type { Channel } from "../src/channels/base.js";
import type { ChatMessage } from "../src/types.js";

type TestConfigOverrides = Partial<
  Omit<Config, "provider" | "retry" | "telegram" | "sessions" | "observability">
> & {
  provider?: Partial<Config["provider"]>;
  retry?: Partial<Config["retry"]>;
  telegram?: Partial<Config["telegram"]>;
  sessions?: Partial<Config["sessions"]>;
  observability?: Partial<Config["observability"]>;
};

export const createConfig = (overrides: TestConfigOverrides = {}): Config =>
  ConfigSchema.parse({
    ...overrides,
    provider: { apiKey: "test-key", ...(overrides.provider ?? {}) },
    retry: { delayUnitMs: 0, ...(overrides.retry ?? {}) },
    telegram: {
      botToken: "test-token",
      allowedUserIds: [42],
      ...(overrides.telegram ?? {})
    },
    sessions: overrides.sessions ?? {},
    observability: { enabled: false, ...(overrides.observability ?? {}) }
  });

export const createNoopLogger = () => pino({ enabled: false });

export const systemInstruction: ChatMessage = {
  role: "system",
  content: "You are a helpful assistant."
};

export const noSleep = async (_ms: number) => undefined;

type Responder = (req: CompletionRequest, call: number) => Promise<string>;

export class StubCompletionClient implements CompletionClient {
  readonly completeCalls: CompletionRequest[] = [];
  readonly summarizeCalls: Array<{ model: string; messages: ChatMessage[] }> = [];

  constructor(
    private responder: Responder = async (_req, call) => `reply ${call}`,
    private summarizer: (messages: ChatMessage[], call: number) => Promise<string> = async () =>
      "summary"
  ) {}

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    this.completeCalls.push(req);
    const content = await this.responder(req, this.completeCalls.length);
    return { choices: [{ message: { content } }] };
  }

  async summarize(req: { model: string; messages: ChatMessage[] }): Promise<string> {
    this.summarizeCalls.push(req);
    return this.summarizer(req.messages, this.summarizeCalls.length);
  }
}

export class FakeChannel implements Channel {
  readonly name = "fake";
  readonly sent: Array<{ chatId: number; content: string; formatted: boolean }> = [];
  readonly typing: number[] = [];
  started = false;

  constructor(private failSend: (content: string) => boolean = () => false) {}

  async start() {
    this.started = true;
  }

  async stop() {
    this.started = false;
  }

  async send(message: { chatId: number; content: string; formatted?: boolean }) {
    if (this.failSend(message.content)) {
      throw new Error("send failed");
    }
    this.sent.push({
      chatId: message.chatId,
      content: message.content,
      formatted: message.formatted ?? false
    });
  }

  async sendTyping(chatId: number) {
    this.typing.push(chatId);
  }
}
