import pino, { type Logger } from "pino";
import type { Config } from "../config/schema.js";

export const createLogger = (config: Pick<Config, "logLevel">): Logger =>
  pino({
    level: config.logLevel,
    base: { service: "relaybot" },
    timestamp: pino.stdTimeFunctions.isoTime
  });

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
