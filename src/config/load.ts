import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigSchema, type Config } from "./schema.js";

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

const parseCsv = (value?: string) =>
  value
    ? value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    : undefined;

const parseNumberCsv = (value?: string) => {
  const parsed = parseCsv(value);
  if (!parsed) {
    return undefined;
  }
  return parsed.map((item) => Number(item));
};

const parseNumber = (value?: string) => (value ? Number(value) : undefined);

const parseBoolean = (value?: string) => (value ? value === "true" : undefined);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonIfExists = (filePath: string): Record<string, unknown> => {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config: ${filePath} is not valid JSON (${detail})`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: ${filePath} must contain a JSON object`);
  }
  return parsed;
};

const dropUndefined = (value: Record<string, unknown>) =>
  Object.fromEntries(Object.entries(value).filter(([, item]) => item !== undefined));

const mergeSection = (
  fileConfig: Record<string, unknown>,
  envConfig: Record<string, Record<string, unknown>>,
  key: string
) => {
  const fromFile = fileConfig[key];
  return {
    ...(isRecord(fromFile) ? fromFile : {}),
    ...dropUndefined(envConfig[key] ?? {})
  };
};

export const loadConfig = (options: LoadConfigOptions = {}): Config => {
  const env = options.env ?? process.env;
  const root = options.cwd ?? process.cwd();
  if (env === process.env) {
    dotenv.config({ path: path.join(root, ".env"), quiet: true });
  }
  const fileConfig = readJsonIfExists(path.join(root, "config.json"));

  const envTopLevel: Record<string, unknown> = {
    logLevel: env.RELAYBOT_LOG_LEVEL,
    locale: env.RELAYBOT_LOCALE,
    systemPrompt: env.SYSTEM_PROMPT,
    historySizeLimit: parseNumber(env.HISTORY_SIZE_LIMIT),
    allowedModels: parseCsv(env.ALLOWED_MODELS)
  };

  const envSections: Record<string, Record<string, unknown>> = {
    provider: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      maxTokens: parseNumber(env.MAX_TOKENS),
      choices: parseNumber(env.N_CHOICES),
      temperature: parseNumber(env.TEMPERATURE),
      presencePenalty: parseNumber(env.PRESENCE_PENALTY),
      frequencyPenalty: parseNumber(env.FREQUENCY_PENALTY),
      summaryTemperature: parseNumber(env.SUMMARY_TEMPERATURE),
      summaryMaxChars: parseNumber(env.SUMMARY_MAX_CHARS),
      timeoutMs: parseNumber(env.OPENAI_TIMEOUT_MS)
    },
    retry: {
      maxAttempts: parseNumber(env.MAX_RETRIES),
      delayUnitMs: parseNumber(env.RETRY_DELAY_UNIT_MS)
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      allowedUserIds: parseNumberCsv(env.ALLOWED_TELEGRAM_USER_IDS),
      chunkSizeLimit: parseNumber(env.TELEGRAM_CHUNK_SIZE_LIMIT),
      parseMode: env.TELEGRAM_PARSE_MODE
    },
    sessions: {
      idleTtlMs: parseNumber(env.SESSION_IDLE_TTL_MS),
      sweepIntervalMs: parseNumber(env.SESSION_SWEEP_INTERVAL_MS)
    },
    observability: {
      enabled: parseBoolean(env.RELAYBOT_OBSERVABILITY),
      reportIntervalMs: parseNumber(env.RELAYBOT_REPORT_INTERVAL_MS)
    }
  };

  const parsed = ConfigSchema.safeParse({
    ...fileConfig,
    ...dropUndefined(envTopLevel),
    provider: mergeSection(fileConfig, envSections, "provider"),
    retry: mergeSection(fileConfig, envSections, "retry"),
    telegram: mergeSection(fileConfig, envSections, "telegram"),
    sessions: mergeSection(fileConfig, envSections, "sessions"),
    observability: mergeSection(fileConfig, envSections, "observability")
  });

  if (!parsed.success) {
    throw new Error(`Invalid config: ${parsed.error.message}`);
  }

  return parsed.data;
};
