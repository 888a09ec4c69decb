/**
 * Centralized configuration
 *
 * Every value can be tuned through environment variables.
 */
import { z } from "zod";
import { BankIdSchema, type BankId } from "@rantekoll/core";
import type { LogLevel } from "./logger.js";

export interface Config {
  logLevel: LogLevel;
  /** Per-crawler deadline, after which its output is discarded */
  crawlerTimeoutMs: number;
  httpTimeoutMs: number;
  httpRetries: number;
  outputPath: string;
  /** Only run these crawlers; empty runs all */
  crawlers: BankId[];
}

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  CRAWLER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  OUTPUT_PATH: z.string().min(1).default("data/interest-sets-latest.json"),
  CRAWLERS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    )
    .pipe(z.array(BankIdSchema)),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL,
    crawlerTimeoutMs: parsed.CRAWLER_TIMEOUT_MS,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    httpRetries: parsed.HTTP_RETRIES,
    outputPath: parsed.OUTPUT_PATH,
    crawlers: parsed.CRAWLERS,
  };
}
