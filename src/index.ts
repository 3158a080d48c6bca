export { createRelayApp, RelayApp, type CreateRelayAppOptions } from "./app.js";
export { main } from "./main.js";
export { runPreflightChecks, type PreflightReport } from "./preflight.js";

export { loadConfig, type LoadConfigOptions } from "./config/load.js";
export type { Config } from "./config/schema.js";

export { ConversationStore, type ConversationSession } from "./session/store.js";
export { HistoryCompactor } from "./agent/compact.js";
export { AgentRuntime } from "./agent/runtime.js";
export { OpenAICompatibleProvider } from "./agent/provider.js";
export type { CompletionClient, CompletionRequest, CompletionResponse } from "./agent/provider.js";
export { withRetry, linearBackoff, type RetryResult } from "./agent/retry.js";
export { ConversationRouter } from "./bus/router.js";
export { parseCommand, resolveModel, type Command } from "./bus/commands.js";
export { repliesFor, type Replies, type Locale } from "./bus/replies.js";
export { chunkText } from "./channels/chunk.js";
export { isUserAuthorized } from "./channels/allowlist.js";
export { TelegramChannel } from "./channels/telegram.js";
export type { Channel } from "./channels/base.js";
export { RuntimeTelemetry } from "./observability/telemetry.js";

export type { ChatMessage, InboundMessage, TurnResult, FailureReason } from "./types.js";
