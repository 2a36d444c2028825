import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  level?: string;
  /**
   * Pretty-print through pino-pretty. Defaults to on outside production and
   * test runs.
   */
  pretty?: boolean;
  destination?: DestinationStream;
}

const wantsPrettyOutput = (): boolean =>
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

/**
 * Creates an application logger.
 */
export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";

  if (options.destination) {
    return pino({ level }, options.destination);
  }

  const transport =
    (options.pretty ?? wantsPrettyOutput())
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "SYS:standard",
          },
        }
      : undefined;

  return pino({ level, transport });
};
