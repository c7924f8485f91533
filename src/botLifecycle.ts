/**
 * Startup steps for the grammy bot. Neither one lets a rejected Telegram
 * call escape: the command menu is best-effort, and a polling failure is
 * logged before the process exits.
 */

import type { Api, Bot } from "grammy";

export const BOT_COMMANDS = [
  { command: "start", description: "Submit a new complaint" },
  { command: "cancel", description: "Cancel the complaint in progress" },
  { command: "mycomplaints", description: "List your complaints" },
  { command: "help", description: "Show available commands" },
];

/** @returns false when Telegram rejected the call */
export async function registerCommands(api: Pick<Api, "setMyCommands">): Promise<boolean> {
  try {
    await api.setMyCommands(BOT_COMMANDS);
    return true;
  } catch (err) {
    console.warn("[bot] setMyCommands failed:", err);
    return false;
  }
}

export function startPolling(
  bot: Pick<Bot, "start">,
  reviewerId: number,
  exit: (code: number) => void = (code) => process.exit(code)
): Promise<void> {
  return bot
    .start({
      drop_pending_updates: true,
      allowed_updates: ["message", "callback_query"],
      onStart: (info) => console.log(`Complaint bot @${info.username} is running (reviewer ${reviewerId})`),
    })
    .catch((error) => {
      console.error("ERROR starting bot:", error);
      exit(1);
    });
}
