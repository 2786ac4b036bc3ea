import pino from "pino";

const level = process.env["LOG_LEVEL"] ?? "info";
const pretty =
  process.env["NODE_ENV"] !== "production" &&
  process.env["NODE_ENV"] !== "test" &&
  level !== "silent";

const logger = pino({
  level,
  transport: pretty
    ? { target: "pino-pretty", options: { colorize: true } }
    : undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/** Child logger carrying the module name and the id of the event being handled. */
export function createEventLogger(module: string, eventId: string): Logger {
  return logger.child({ module, eventId });
}

export default logger;
