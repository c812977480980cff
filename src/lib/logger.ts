type LogLevel = "info" | "warn" | "error" | "debug";

interface LogPayload {
  level: LogLevel;
  message: string;
  requestId?: string;
  [key: string]: unknown;
}

function formatPayload(p: LogPayload): string {
  return JSON.stringify({
    ...p,
    timestamp: new Date().toISOString(),
  });
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export const logger: Logger = {
  info(message, meta) {
    console.log(formatPayload({ level: "info", message, ...meta }));
  },
  warn(message, meta) {
    console.warn(formatPayload({ level: "warn", message, ...meta }));
  },
  error(message, meta) {
    console.error(formatPayload({ level: "error", message, ...meta }));
  },
  debug(message, meta) {
    if (process.env.NODE_ENV !== "production") {
      console.debug(formatPayload({ level: "debug", message, ...meta }));
    }
  },
};

/** Error message for log metadata; never the stack. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
