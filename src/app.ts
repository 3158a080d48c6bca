import type { Logger } from "pino";
import { loadConfig } from "./config/load.js";
import type { Config } from "./config/schema.js";
import type { ChatMessage } from "./types.js";
import { createLogger } from "./observability/logger.js";
import { RuntimeTelemetry } from "./observability/telemetry.js";
import { ConversationStore } from "./session/store.js";
import { HistoryCompactor } from "./agent/compact.js";
import { AgentRuntime } from "./agent/runtime.js";
import { OpenAICompatibleProvider, type CompletionClient } from "./agent/provider.js";
import { ConversationRouter } from "./bus/router.js";
import { repliesFor } from "./bus/replies.js";
import { TelegramChannel } from "./channels/telegram.js";
import type { Channel } from "./channels/base.js";

export type CreateRelayAppOptions = {
  config?: Config;
  logger?: Logger;
  client?: CompletionClient;
  channel?: Channel;
  sleep?: (ms: number) => Promise<void>;
};

export class RelayApp {
  private observabilityTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private started = false;

  constructor(
    readonly config: Config,
    readonly logger: Logger,
    readonly telemetry: RuntimeTelemetry,
    readonly store: ConversationStore,
    readonly runtime: AgentRuntime,
    readonly router: ConversationRouter,
    readonly channel: Channel
  ) {
    this.router.attach(this.channel);
  }

  isRunning() {
    return this.started;
  }

  async start() {
    if (this.started) {
      return;
    }

    await this.channel.start(this.router, this.logger);
    this.started = true;

    if (this.config.observability.enabled) {
      this.observabilityTimer = setInterval(() => {
        this.logger.info(
          { observability: { sessions: this.store.size, ...this.telemetry.snapshot() } },
          "runtime observability snapshot"
        );
      }, this.config.observability.reportIntervalMs);
      this.observabilityTimer.unref();
    }

    if (this.config.sessions.idleTtlMs > 0) {
      this.sweepTimer = setInterval(() => {
        const evicted = this.store.evictIdle();
        if (evicted > 0) {
          this.logger.info({ evicted, remaining: this.store.size }, "evicted idle sessions");
        }
      }, this.config.sessions.sweepIntervalMs);
      this.sweepTimer.unref();
    }

    this.logger.info(
      {
        channel: this.channel.name,
        model: this.config.provider.model,
        historySizeLimit: this.config.historySizeLimit,
        allowedUsers: this.config.telegram.allowedUserIds.length
      },
      "relay started"
    );
  }

  async stop() {
    if (!this.started) {
      return;
    }
    this.started = false;
    if (this.observabilityTimer) {
      clearInterval(this.observabilityTimer);
      this.observabilityTimer = null;
    }
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.channel.stop();
    this.logger.info({ telemetry: this.telemetry.snapshot() }, "relay stopped");
  }
}

export const createRelayApp = (options: CreateRelayAppOptions = {}): RelayApp => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const telemetry = new RuntimeTelemetry();
  const replies = repliesFor(config.locale);

  const systemInstruction: ChatMessage = { role: "system", content: config.systemPrompt };
  const store = new ConversationStore({
    systemInstruction,
    defaultModel: config.provider.model,
    idleTtlMs: config.sessions.idleTtlMs
  });

  const client = options.client ?? new OpenAICompatibleProvider(config);
  const compactor = new HistoryCompactor({
    client,
    systemInstruction,
    historySizeLimit: config.historySizeLimit,
    maxAttempts: config.retry.maxAttempts,
    delayUnitMs: config.retry.delayUnitMs,
    logger,
    telemetry,
    sleep: options.sleep
  });
  const runtime = new AgentRuntime({
    client,
    compactor,
    config,
    logger,
    errorTemplate: replies.completionError,
    telemetry,
    sleep: options.sleep
  });
  const router = new ConversationRouter({ store, runtime, config, logger, replies, telemetry });
  const channel = options.channel ?? new TelegramChannel(config, replies);

  return new RelayApp(config, logger, telemetry, store, runtime, router, channel);
};
