/**
 * Runtime configuration resolved from environment variables.
 *
 *   TELEGRAM_BOT_TOKEN — required, from @BotFather
 *   REVIEWER_USER_ID   — required, Telegram user id of the reviewer.
 *                        Status buttons only work for this user, and new
 *                        complaints are sent to their private chat.
 *   SUPABASE_URL / SUPABASE_ANON_KEY — optional audit trail
 */

import { ConfigError } from "../complaints/errors.ts";

export interface BotConfig {
  botToken: string;
  reviewerId: number;
  supabaseUrl?: string;
  supabaseAnonKey?: string;
}

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = (env.TELEGRAM_BOT_TOKEN || "").trim();
  if (!botToken) {
    throw new ConfigError("TELEGRAM_BOT_TOKEN not set");
  }

  const rawReviewer = (env.REVIEWER_USER_ID || "").trim();
  if (!rawReviewer) {
    throw new ConfigError("REVIEWER_USER_ID not set");
  }
  if (!/^-?\d+$/.test(rawReviewer)) {
    throw new ConfigError(`REVIEWER_USER_ID must be an integer, got "${rawReviewer}"`);
  }

  return {
    botToken,
    reviewerId: parseInt(rawReviewer, 10),
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseAnonKey: env.SUPABASE_ANON_KEY || undefined,
  };
}
