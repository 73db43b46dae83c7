import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(options: { service: string; level?: string }): Logger {
  const level =
    options.level || process.env.EMAIL_IDENTITY_LOG_LEVEL || process.env.LOG_LEVEL || "warn";

  return pino({
    name: options.service,
    level,
    base: { service: options.service },
    serializers: {
      err: pino.stdSerializers.err,
    },
  });
}
