// packages/core/src/logger.ts
import { destination, pino, type Logger } from "pino";

export type { Logger };

/**
 * Logs go to stderr: stdout belongs to the terminal chat.
 */
export function createLogger(level = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({ name: "chat-storefront", level }, destination(2));
}

export const log = createLogger();

export function moduleLogger(module: string): Logger {
  return log.child({ module });
}
