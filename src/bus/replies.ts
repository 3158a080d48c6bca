export type Locale = "en" | "ru";

export type Replies = {
  completionError: (message: string) => string;
  modelSet: (model: string) => string;
  unknownModel: (model: string, allowed: readonly string[]) => string;
  conversationReset: string;
  modelCommandDescription: (defaultModel: string) => string;
  resetCommandDescription: string;
};

const en: Replies = {
  completionError: (message) =>
    `Sorry, something went wrong while processing your request. Please try again later. Error: ${message}`,
  modelSet: (model) => `Using model ${model}.`,
  unknownModel: (model, allowed) =>
    `Unknown model ${model}. Available models: ${allowed.join(", ")}.`,
  conversationReset: "Conversation reset.",
  modelCommandDescription: (defaultModel) =>
    `Sets the GPT model (e.g. /model <gpt-4|gpt-3.5-turbo|...>). Defaults to ${defaultModel}.`,
  resetCommandDescription: "Resets the conversation."
};

const ru: Replies = {
  completionError: (message) =>
    `Извините, произошла ошибка при обработке вашего запроса. Пожалуйста, попробуйте снова позже. Ошибка: ${message}`,
  modelSet: (model) => `Использую модель ${model}.`,
  unknownModel: (model, allowed) =>
    `Неизвестная модель ${model}. Доступные модели: ${allowed.join(", ")}.`,
  conversationReset: "Разговор перезагрузился.",
  modelCommandDescription: (defaultModel) =>
    `Устанавливает модель GPT (например, /model <gpt-4|gpt-3.5-turbo|...> ). По умолчанию это ${defaultModel}.`,
  resetCommandDescription: "Перезагружает разговор."
};

const byLocale: Record<Locale, Replies> = { en, ru };

export const repliesFor = (locale: Locale): Replies => byLocale[locale];
