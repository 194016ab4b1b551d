export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createNoopLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {}
  };
}

/**
 * Console logger with a `[component]` prefix and JSON-encoded context.
 */
export function createConsoleLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    info(message, context) {
      console.log(prefix, message, context ? JSON.stringify(context) : "");
    },
    warn(message, context) {
      console.warn(prefix, message, context ? JSON.stringify(context) : "");
    },
    error(message, context) {
      console.error(prefix, message, context ? JSON.stringify(context) : "");
    }
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
