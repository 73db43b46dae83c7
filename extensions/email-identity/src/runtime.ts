import { createLogger, type Logger } from "./logger.js";

let logger: Logger | null = null;

export function setIdentityLogger(next: Logger) {
  logger = next;
}

export function getIdentityLogger(): Logger {
  if (!logger) {
    logger = createLogger({ service: "email-identity" });
  }
  return logger;
}
