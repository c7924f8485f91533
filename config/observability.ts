/**
 * Centralised observability configuration.
 *
 * Externalises log directory, retention period, and enabled flag so they
 * can be changed via environment variables without touching source files.
 *
 * Imported by src/utils/tracer.ts.
 */

import { join } from "node:path";

export interface ObservabilityConfig {
  /** Directory where JSONL trace files are written. */
  logDir: string;
  /** Number of days to retain trace files before cleanup. */
  retentionDays: number;
  /** Whether structured tracing is active. Enable with OBSERVABILITY_ENABLED=1. */
  enabled: boolean;
}

/**
 * Returns the current observability configuration resolved from
 * environment variables with sensible defaults.
 *
 * Called once at tracer module initialisation; changes to env vars
 * after module load are not reflected at runtime.
 *
 * Override defaults via .env:
 *   BOT_DATA_DIR       — root directory (default: ~/.lecture-complaint-bot)
 *   LOG_DIR            — JSONL log directory (default: {BOT_DATA_DIR}/logs)
 *   LOG_RETENTION_DAYS — days to keep log files (default: 30)
 *   OBSERVABILITY_ENABLED — set to "1" or "true" to enable (default: off)
 */
export function getObservabilityConfig(
  env: NodeJS.ProcessEnv = process.env
): ObservabilityConfig {
  const dataDir =
    env.BOT_DATA_DIR || join(env.HOME || "~", ".lecture-complaint-bot");

  return {
    logDir: env.LOG_DIR || join(dataDir, "logs"),
    retentionDays: Number(env.LOG_RETENTION_DAYS) || 30,
    enabled: ["1", "true"].includes((env.OBSERVABILITY_ENABLED || "").toLowerCase()),
  };
}
