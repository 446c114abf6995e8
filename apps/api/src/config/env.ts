/**
 * Environment configuration
 *
 * Validates process environment variables once at startup and exposes them
 * as a typed object. Every endpoint URL has a local-development fallback.
 */

import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

export const DEFAULT_INSTRUCTIONS =
  "You are a helpful RAG assistant. Use the search tool to answer questions.";

const envSchema = z.object({
  // ===== Server =====
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  CORS_ORIGIN: z.string().optional(),

  // ===== VoiceRag realtime endpoint =====
  VOICERAG_URL: z.string().url().default("ws://localhost:8765/realtime"),
  VOICERAG_INSTRUCTIONS: z.string().min(1).default(DEFAULT_INSTRUCTIONS),
  VOICERAG_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // ===== Knowledge-base REST endpoint =====
  VOICERAG_REST_URL: z.string().url().default("http://localhost:8765/"),
  KNOWLEDGE_BASE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // ===== Azure Communication Services (chat relay) =====
  ACS_CONNECTION_STRING: z
    .string()
    .optional()
    .refine(
      (value) => !value || (/endpoint=/i.test(value) && /accesskey=/i.test(value)),
      "expected endpoint=https://...;accesskey=..."
    ),
  ACS_BOT_ID: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Env {
  // Empty strings in .env files mean "not set"
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}
