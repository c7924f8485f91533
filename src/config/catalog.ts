/**
 * Static option lists offered by the bot.
 *
 * Batches and subjects are shown as inline buttons, so keep labels short
 * enough for a Telegram button row. Changing a list needs a restart.
 */

import type { ComplaintStatus } from "../complaints/types.ts";

export interface StatusAction {
  status: ComplaintStatus;
  label: string;
}

export interface Catalog {
  batches: readonly string[];
  subjects: readonly string[];
  /** Buttons shown on the reviewer card, two per row */
  statusActions: readonly StatusAction[];
}

export const DEFAULT_CATALOG: Catalog = {
  batches: ["Master quest 2.0 2025", "master quest 2026", "Ace ipm crash course"],
  subjects: ["Quant", "DILR", "VARC", "Current Affairs"],
  statusActions: [
    { status: "send", label: "Send" },
    { status: "seen", label: "Seen" },
    { status: "approved", label: "Approved" },
    { status: "resolved", label: "Resolved" },
  ],
};
