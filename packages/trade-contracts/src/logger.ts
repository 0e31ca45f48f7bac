export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const consoleLogger: Logger = {
  info: (msg, meta) => console.log("[INFO]", msg, meta ?? ""),
  warn: (msg, meta) => console.warn("[WARN]", msg, meta ?? ""),
  error: (msg, meta) => console.error("[ERROR]", msg, meta ?? ""),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
