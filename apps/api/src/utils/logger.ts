import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

// Same shape as `request.log`, so route handlers can pass theirs down.
export type Logger = FastifyBaseLogger;

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { app: "callbridge" },
});

export function createLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
