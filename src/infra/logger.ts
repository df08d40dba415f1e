import { pino, type LevelWithSilent, type Logger } from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "card_number",
  "cvv",
  "*.card_number",
  "*.cvv",
];

export interface LoggerOptions {
  level: LevelWithSilent;
  service?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { service: options.service ?? "card-payments" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  });
}

/** Keeps the Logger type while discarding output. */
export function createSilentLogger(): Logger {
  return pino({ enabled: false });
}
