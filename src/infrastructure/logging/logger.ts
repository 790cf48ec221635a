export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, err?: unknown, meta?: Record<string, unknown>): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    info(message, meta) {
      console.log(`${prefix} ${message}`, meta ? JSON.stringify(meta) : "");
    },
    warn(message, meta) {
      console.warn(`${prefix} ${message}`, meta ? JSON.stringify(meta) : "");
    },
    error(message, err, meta) {
      const errMsg = err instanceof Error ? err.message : err ? String(err) : "";
      console.error(`${prefix} ${message}`, errMsg, meta ? JSON.stringify(meta) : "");
    },
  };
}
