/**
 * Lecture Complaint Bot
 *
 * Collects lecture complaints over Telegram and forwards them to a single
 * reviewer, who updates their status from inline buttons.
 *
 * Run: npm start
 */

import { Bot, GrammyError, HttpError } from "grammy";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { registerCommands, startPolling } from "./botLifecycle.ts";
import { ComplaintBot, ConfigError, TelegramGateway, toInboundEvent } from "./complaints/index.ts";
import { loadBotConfig, type BotConfig } from "./config/botConfig.ts";
import { loadEnvFile } from "./config/loadEnv.ts";
import { createAuditLog } from "./utils/auditLog.ts";
import { createSupabaseClient } from "./utils/supabase.ts";
import { generateTraceId, trace } from "./utils/tracer.ts";

const PROJECT_ROOT = dirname(dirname(fileURLToPath(import.meta.url)));

// Load .env file explicitly (for systemd and other non-interactive contexts)
loadEnvFile(join(PROJECT_ROOT, ".env"));

// ============================================================
// CONFIGURATION
// ============================================================

function loadConfigOrExit(): BotConfig {
  try {
    return loadBotConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`${err.message}!`);
    console.log("\nTo set up:");
    console.log("1. Message @BotFather on Telegram");
    console.log("2. Create a new bot with /newbot");
    console.log("3. Copy the token to .env as TELEGRAM_BOT_TOKEN");
    console.log("4. Put the reviewer's numeric Telegram user id in .env as REVIEWER_USER_ID");
    process.exit(1);
  }
}

const config = loadConfigOrExit();

// ============================================================
// SETUP
// ============================================================

const bot = new Bot(config.botToken);
const complaints = new ComplaintBot({
  gateway: new TelegramGateway(bot.api),
  reviewerId: config.reviewerId,
  audit: createAuditLog(createSupabaseClient(config)),
});

bot.on(["message", "callback_query:data"], async (ctx) => {
  const event = toInboundEvent(ctx);
  if (!event) return;

  const traceId = generateTraceId();
  const handled = await complaints.handle(event);
  trace({
    event: "update_handled",
    traceId,
    kind: event.kind,
    userId: event.actor.id,
    target: handled.target,
    delivered: handled.report.delivered.length,
    failed: handled.report.failed.length,
  });
});

// A failing update must not take the bot down
bot.catch((err) => {
  const ctx = err.ctx;
  console.error(`Error while handling update ${ctx.update.update_id}:`);
  const e = err.error;
  if (e instanceof GrammyError) {
    console.error("Error in request:", e.description);
  } else if (e instanceof HttpError) {
    console.error("Could not contact Telegram:", e);
  } else {
    console.error("Unknown error:", e);
  }
});

// ============================================================
// START
// ============================================================

void registerCommands(bot.api);

const shutdown = (signal: string) => {
  console.log(`Received ${signal}, stopping bot...`);
  void bot.stop();
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled rejection at:", promise, "reason:", reason);
});

void startPolling(bot, config.reviewerId);
