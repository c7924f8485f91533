/**
 * Supabase client factory.
 *
 * Returns null when SUPABASE_URL or SUPABASE_ANON_KEY are not configured
 * so callers can skip the audit trail entirely.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { BotConfig } from "../config/botConfig.ts";

export function createSupabaseClient(
  config: Pick<BotConfig, "supabaseUrl" | "supabaseAnonKey">
): SupabaseClient | null {
  if (!config.supabaseUrl || !config.supabaseAnonKey) {
    console.warn("Supabase credentials not configured — complaint audit trail disabled");
    return null;
  }
  return createClient(config.supabaseUrl, config.supabaseAnonKey);
}
