import { z } from "zod";
import type { ChatMessage } from "../types.js";
import type { Config } from "../config/schema.js";

export type CompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
  n?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
};

export type CompletionResponse = {
  choices: Array<{ message: { content: string } }>;
};

export interface CompletionClient {
  complete(req: CompletionRequest): Promise<CompletionResponse>;
  summarize(req: { model: string; messages: ChatMessage[] }): Promise<string>;
}

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        })
      })
    )
    .min(1)
});

export const summaryInstruction = (maxChars: number) =>
  `Summarize this conversation in ${maxChars} characters or less, using the main language of the conversation.`;

export class OpenAICompatibleProvider implements CompletionClient {
  constructor(
    private config: Config,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    const apiKey = this.config.provider.apiKey;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY is missing.");
    }
    const payload: Record<string, unknown> = {
      model: req.model,
      messages: req.messages,
      temperature: req.temperature
    };
    if (req.maxTokens !== undefined) {
      payload.max_tokens = req.maxTokens;
    }
    if (req.n !== undefined) {
      payload.n = req.n;
    }
    if (req.presencePenalty !== undefined) {
      payload.presence_penalty = req.presencePenalty;
    }
    if (req.frequencyPenalty !== undefined) {
      payload.frequency_penalty = req.frequencyPenalty;
    }

    const response = await this.fetchImpl(`${this.config.provider.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.config.provider.timeoutMs)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Provider error: ${response.status} ${text}`);
    }

    const parsed = CompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Provider returned an unexpected payload: ${parsed.error.message}`);
    }

    return {
      choices: parsed.data.choices.map((choice) => ({
        message: { content: choice.message.content ?? "" }
      }))
    };
  }

  async summarize(req: { model: string; messages: ChatMessage[] }): Promise<string> {
    const response = await this.complete({
      model: req.model,
      messages: [
        {
          role: "assistant",
          content: summaryInstruction(this.config.provider.summaryMaxChars)
        },
        { role: "user", content: JSON.stringify(req.messages) }
      ],
      temperature: this.config.provider.summaryTemperature
    });
    return response.choices[0]?.message.content ?? "";
  }
}
