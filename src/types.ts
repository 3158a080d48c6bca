export type MessageRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: MessageRole;
  content: string;
};

export type InboundMessage = {
  chatId: number;
  userId: number;
  text: string;
};

export type FailureReason = "CompletionFailure" | "SummarizationFailure" | "Unauthorized";

export type TurnResult =
  | { ok: true; text: string }
  | { ok: false; reason: FailureReason; text: string };
