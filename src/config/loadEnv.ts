/**
 * .env loader for non-interactive contexts (systemd, pm2, docker).
 *
 * Variables already present in the environment win over the file.
 */

import { readFileSync } from "node:fs";

/** Parse KEY=value lines. Blank lines and # comments are skipped. */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const [key, ...valueParts] = trimmed.split("=");
    if (key && valueParts.length > 0) {
      vars[key.trim()] = valueParts.join("=").trim();
    }
  }
  return vars;
}

/**
 * Load a .env file into `env`, skipping keys that are already set.
 *
 * @returns the keys that were applied; empty when the file is missing
 */
export function loadEnvFile(envPath: string, env: NodeJS.ProcessEnv = process.env): string[] {
  let content: string;
  try {
    content = readFileSync(envPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      console.warn(`[config] could not read ${envPath}:`, err);
    }
    return [];
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseEnvFile(content))) {
    if (env[key]) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}
