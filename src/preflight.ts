import { loadConfig, type LoadConfigOptions } from "./config/load.js";

export type PreflightReport = {
  model: string;
  baseUrl: string;
  historySizeLimit: number;
  maxAttempts: number;
  chunkSizeLimit: number;
  allowedUserCount: number;
  allowedModels: string[];
  hasApiKey: boolean;
  hasBotToken: boolean;
  warnings: string[];
};

export const runPreflightChecks = (options: LoadConfigOptions = {}): PreflightReport => {
  const config = loadConfig(options);
  const warnings: string[] = [];

  const hasApiKey = Boolean(config.provider.apiKey);
  const hasBotToken = Boolean(config.telegram.botToken?.trim());
  if (!hasApiKey) {
    warnings.push("OPENAI_API_KEY is not set; every completion will fail.");
  }
  if (!hasBotToken) {
    warnings.push("TELEGRAM_BOT_TOKEN is not set; the bot cannot start.");
  }
  if (config.telegram.allowedUserIds.length === 0) {
    warnings.push("ALLOWED_TELEGRAM_USER_IDS is empty; every message will be dropped.");
  }

  return {
    model: config.provider.model,
    baseUrl: config.provider.baseUrl,
    historySizeLimit: config.historySizeLimit,
    maxAttempts: config.retry.maxAttempts,
    chunkSizeLimit: config.telegram.chunkSizeLimit,
    allowedUserCount: config.telegram.allowedUserIds.length,
    allowedModels: config.allowedModels,
    hasApiKey,
    hasBotToken,
    warnings
  };
};
