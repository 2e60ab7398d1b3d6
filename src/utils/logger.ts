const timestamp = () => new Date().toISOString();

export interface Logger {
  info(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  warn(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = (level: string) => `[${timestamp()}] ${level} [${scope}]:`;

  return {
    info(message, data) {
      console.log(`${prefix("INFO")} ${message}`, data ?? "");
    },
    error(message, error) {
      console.error(`${prefix("ERROR")} ${message}`, error ?? "");
    },
    warn(message, data) {
      console.warn(`${prefix("WARN")} ${message}`, data ?? "");
    },
    debug(message, data) {
      if (process.env.DEBUG === "true") {
        console.log(`${prefix("DEBUG")} ${message}`, data ?? "");
      }
    },
  };
}

export const logger = createLogger("outreach");
