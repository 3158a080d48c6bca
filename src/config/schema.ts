import { z } from "zod";

export const ConfigSchema = z.object({
  logLevel: z.string().default("info"),
  locale: z.enum(["en", "ru"]).default("en"),
  systemPrompt: z.string().min(1).default("You are a helpful assistant."),
  historySizeLimit: z.number().int().min(1).default(10),
  allowedModels: z.array(z.string().min(1)).default([]),
  provider: z
    .object({
      apiKey: z.string().optional(),
      baseUrl: z.string().default("https://api.openai.com/v1"),
      model: z.string().min(1).default("gpt-3.5-turbo"),
      maxTokens: z.number().int().min(1).default(1200),
      choices: z.number().int().min(1).max(16).default(1),
      temperature: z.number().min(0).max(2).default(1),
      presencePenalty: z.number().min(-2).max(2).default(0),
      frequencyPenalty: z.number().min(-2).max(2).default(0),
      summaryTemperature: z.number().min(0).max(2).default(0.4),
      summaryMaxChars: z.number().int().min(50).default(700),
      timeoutMs: z.number().int().min(1_000).default(60_000)
    })
    .prefault({}),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(20).default(3),
      delayUnitMs: z.number().int().min(0).max(60_000).default(1_000)
    })
    .prefault({}),
  telegram: z
    .object({
      botToken: z.string().optional(),
      allowedUserIds: z.array(z.number().int()).default([]),
      chunkSizeLimit: z.number().int().min(1).max(4096).default(4096),
      parseMode: z.enum(["Markdown", "MarkdownV2", "HTML", "none"]).default("Markdown")
    })
    .prefault({}),
  sessions: z
    .object({
      idleTtlMs: z.number().int().min(0).default(0),
      sweepIntervalMs: z.number().int().min(1_000).default(600_000)
    })
    .prefault({}),
  observability: z
    .object({
      enabled: z.boolean().default(true),
      reportIntervalMs: z.number().int().min(1_000).default(300_000)
    })
    .prefault({})
});

export type Config = z.infer<typeof ConfigSchema>;
