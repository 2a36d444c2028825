import { createLogger, type Logger } from "../logger";

export interface CapturedLogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

const isCapturedLogEntry = (value: unknown): value is CapturedLogEntry =>
  typeof value === "object" &&
  value !== null &&
  typeof Reflect.get(value, "level") === "number" &&
  typeof Reflect.get(value, "msg") === "string";

/**
 * Logger writing JSON lines into memory so tests can assert on them.
 */
export const createCaptureLogger = (
  level = "debug",
): { logger: Logger; entries: CapturedLogEntry[] } => {
  const entries: CapturedLogEntry[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isCapturedLogEntry(parsed)) {
          entries.push(parsed);
        }
      },
    },
  });
  return { logger, entries };
};
