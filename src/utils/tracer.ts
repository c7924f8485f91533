/**
 * Structured JSONL tracer.
 *
 * One JSON object per line in {logDir}/YYYY-MM-DD.jsonl
 * (default ~/.lecture-complaint-bot/logs). Off unless OBSERVABILITY_ENABLED=1.
 *
 * The log directory is created once, and files past the retention period
 * are removed, before the first line is written. Lines are appended in
 * call order. trace() never blocks the caller and never throws.
 */

import { randomUUID } from "node:crypto";
import { appendFile, mkdir, readdir, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import { getObservabilityConfig, type ObservabilityConfig } from "../../config/observability.ts";

export interface Tracer {
  trace(event: Record<string, unknown>): void;
  /** Resolves once every line traced so far has been written (or has failed). */
  flush(): Promise<void>;
}

export function createTracer(config: ObservabilityConfig): Tracer {
  const { logDir, retentionDays, enabled } = config;

  let ready: Promise<void> | undefined;
  let pending: Promise<void> = Promise.resolve();

  const prepare = (): Promise<void> =>
    (ready ??= mkdir(logDir, { recursive: true }).then(() =>
      removeExpired(logDir, retentionDays).catch((err) => {
        console.warn("[tracer] cleanup failed:", err);
      })
    ));

  return {
    trace(event) {
      if (!enabled) return;
      const line = JSON.stringify({ ts: new Date().toISOString(), ...event }) + "\n";
      pending = pending
        .then(prepare)
        .then(() => appendFile(logPathFor(logDir, new Date()), line))
        .catch((err) => {
          console.error("[tracer] write failed:", err);
        });
    },
    flush() {
      return pending;
    },
  };
}

async function removeExpired(logDir: string, retentionDays: number): Promise<void> {
  const cutoff = Date.now() - retentionDays * 86400_000;
  for (const f of await readdir(logDir)) {
    if (!f.endsWith(".jsonl")) continue;
    const fp = join(logDir, f);
    if ((await stat(fp)).mtimeMs < cutoff) await unlink(fp);
  }
}

export function logPathFor(logDir: string, date: Date): string {
  return join(logDir, `${date.toISOString().slice(0, 10)}.jsonl`);
}

// Process-wide tracer; config is read once at import.
const tracer = createTracer(getObservabilityConfig());

export function trace(event: Record<string, unknown>): void {
  tracer.trace(event);
}

/** Correlates the events of one update. */
export function generateTraceId(): string {
  return randomUUID();
}
