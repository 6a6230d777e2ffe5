import pino from "pino";

/**
 * The slice of a pino logger the pipeline writes through.
 * Fastify's request/app loggers satisfy it, so do `pino({ level: "silent" })` instances in tests.
 */
export type Logger = Pick<pino.BaseLogger, "fatal" | "error" | "warn" | "info" | "debug">;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export function createLogger(args: { level?: LogLevel; pretty?: boolean } = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";

  return pino({
    level: args.level ?? (isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && args.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
