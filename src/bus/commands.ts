import type { Config } from "../config/schema.js";

export type Command =
  | { name: "model"; argument: string }
  | { name: "reset" }
  | { name: "unsupported"; command: string };

const commandPattern = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

export const parseCommand = (text: string): Command | null => {
  const match = commandPattern.exec(text.trim());
  if (!match) {
    return null;
  }
  const name = (match[1] ?? "").toLowerCase();
  if (name === "model") {
    return { name: "model", argument: (match[2] ?? "").trim() };
  }
  if (name === "reset") {
    return { name: "reset" };
  }
  return { name: "unsupported", command: name };
};

export type ModelResolution =
  | { ok: true; model: string }
  | { ok: false; model: string; allowed: readonly string[] };

/** An empty argument selects the default model, which is always accepted. */
export const resolveModel = (
  requested: string,
  config: Pick<Config, "allowedModels" | "provider">
): ModelResolution => {
  const model = requested.trim() || config.provider.model;
  if (
    config.allowedModels.length > 0 &&
    model !== config.provider.model &&
    !config.allowedModels.includes(model)
  ) {
    return { ok: false, model, allowed: config.allowedModels };
  }
  return { ok: true, model };
};
