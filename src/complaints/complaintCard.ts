/**
 * Complaint Card
 *
 * Text and inline keyboards for every message the complaint flow sends:
 * step prompts to the submitter, the reviewer card, status notifications.
 * All text is Telegram HTML (parse_mode: "HTML"); user input is escaped.
 *
 * Callback data (≤ 64 bytes per Telegram limit):
 *
 *   batch:{idx}              — pick batch idx from the catalog
 *   subject:{idx}            — pick subject idx from the catalog
 *   flow:restart             — back to batch selection, draft emptied
 *   flow:cancel              — abandon the draft
 *   status:{id}:{status}     — reviewer sets complaint status
 */

import { InlineKeyboard } from "grammy";
import type { Catalog } from "../config/catalog.ts";
import type { Complaint, ComplaintStatus, DraftSession } from "./types.ts";

const DIVIDER = "━".repeat(20);

export const RESTART_DATA = "flow:restart";
export const CANCEL_DATA = "flow:cancel";

// ──────────────────────────────────────────────
// Callback data
// ──────────────────────────────────────────────

export type CallbackAction =
  | { kind: "batch"; index: number }
  | { kind: "subject"; index: number }
  | { kind: "restart" }
  | { kind: "cancel" }
  | { kind: "status"; complaintId: number; status: string }
  | { kind: "unknown" };

export function batchData(index: number): string {
  return `batch:${index}`;
}

export function subjectData(index: number): string {
  return `subject:${index}`;
}

export function statusData(complaintId: number, status: ComplaintStatus): string {
  return `status:${complaintId}:${status}`;
}

/** True for data owned by the reviewer workflow rather than the submission flow */
export function isStatusData(data: string): boolean {
  return data.startsWith("status:");
}

export function parseCallbackData(data: string): CallbackAction {
  if (data === RESTART_DATA) return { kind: "restart" };
  if (data === CANCEL_DATA) return { kind: "cancel" };

  const parts = data.split(":");
  const [prefix] = parts;

  if ((prefix === "batch" || prefix === "subject") && parts.length === 2 && /^\d+$/.test(parts[1])) {
    return { kind: prefix, index: parseInt(parts[1], 10) };
  }

  if (prefix === "status" && parts.length === 3 && /^\d+$/.test(parts[1]) && parts[2]) {
    return { kind: "status", complaintId: parseInt(parts[1], 10), status: parts[2] };
  }

  return { kind: "unknown" };
}

// ──────────────────────────────────────────────
// Keyboards
// ──────────────────────────────────────────────

export function buildBatchKeyboard(catalog: Catalog): InlineKeyboard {
  const rows = catalog.batches.map((batch, i) => [InlineKeyboard.text(batch, batchData(i))]);
  return InlineKeyboard.from([...rows, [InlineKeyboard.text("✖ Cancel", CANCEL_DATA)]]);
}

export function buildSubjectKeyboard(catalog: Catalog): InlineKeyboard {
  const rows = catalog.subjects.map((subject, i) => [InlineKeyboard.text(subject, subjectData(i))]);
  return InlineKeyboard.from([...rows, ...buildFlowNavKeyboard().inline_keyboard]);
}

/** Start Over / Cancel row, shown under free-text and photo prompts */
export function buildFlowNavKeyboard(): InlineKeyboard {
  return InlineKeyboard.from([
    [InlineKeyboard.text("\u{1F504} Start Over", RESTART_DATA), InlineKeyboard.text("✖ Cancel", CANCEL_DATA)],
  ]);
}

export function buildStatusKeyboard(complaintId: number, catalog: Catalog): InlineKeyboard {
  const buttons = catalog.statusActions.map((a) =>
    InlineKeyboard.text(a.label, statusData(complaintId, a.status))
  );
  // Two per row
  const rows: (typeof buttons)[] = [];
  for (let i = 0; i < buttons.length; i += 2) rows.push(buttons.slice(i, i + 2));
  return InlineKeyboard.from(rows);
}

// ──────────────────────────────────────────────
// Submitter-facing text
// ──────────────────────────────────────────────

export function formatWelcome(firstName?: string): string {
  return (
    `\u{1F44B} Welcome ${escapeHtml(firstName || "there")}!\n\n` +
    `I'm here to help you submit complaints about lectures.\n\n` +
    `Please follow these steps:\n` +
    `1️⃣ Select your batch\n` +
    `2️⃣ Choose the subject\n` +
    `3️⃣ Enter the lecture name\n` +
    `4️⃣ Upload a screenshot\n\n` +
    `Let's start by selecting your batch:`
  );
}

export function formatRestart(): string {
  return "\u{1F504} Starting over. Please select your batch:";
}

export function formatBatchSelected(batch: string): string {
  return `✅ Batch selected: <b>${escapeHtml(batch)}</b>\n\nNow please select the subject:`;
}

export function formatSubjectSelected(batch: string, subject: string): string {
  return (
    `✅ Subject selected: <b>${escapeHtml(subject)}</b>\n` +
    `\u{1F4DA} Batch: ${escapeHtml(batch)}\n\n` +
    `Now please type the <b>lecture name</b> in the chat:`
  );
}

export function formatLectureSaved(batch: string, subject: string, lectureName: string): string {
  return (
    `✅ <b>Lecture name saved:</b> ${escapeHtml(lectureName)}\n\n` +
    `\u{1F4CB} <b>Summary so far:</b>\n` +
    `• Batch: ${escapeHtml(batch)}\n` +
    `• Subject: ${escapeHtml(subject)}\n` +
    `• Lecture: ${escapeHtml(lectureName)}\n\n` +
    `\u{1F4F8} Now please send a <b>screenshot</b> (image file) related to your complaint:`
  );
}

/** Re-prompt for input that does not fit the current step */
export function formatStepReminder(step: DraftSession["step"]): string {
  switch (step) {
    case "awaiting_batch":
      return "☝️ Please use the buttons to select your batch.";
    case "awaiting_subject":
      return "☝️ Please use the buttons to select the subject.";
    case "awaiting_lecture_name":
      return "❌ Please enter a valid lecture name:";
    case "awaiting_photo":
      return "❌ Please send an image file (screenshot). Other file types are not accepted.";
  }
}

export function formatSubmitted(complaint: Complaint): string {
  return (
    `✅ <b>Complaint submitted successfully!</b>\n\n` +
    `\u{1F194} <b>Complaint ID:</b> <code>${formatComplaintId(complaint.id)}</code>\n` +
    `\u{1F4CA} <b>Status:</b> ${statusLabel(complaint.status)}\n\n` +
    `Your complaint has been forwarded to the admin team. ` +
    `You will be notified when the status changes.\n\n` +
    `Thank you for your feedback! \u{1F64F}`
  );
}

export function formatCancelled(): string {
  return (
    `❌ <b>Complaint submission cancelled.</b>\n\n` +
    `You can start again anytime by using /start command.\n\n` +
    `Thank you! \u{1F64F}`
  );
}

export function formatNothingToCancel(): string {
  return "There is no complaint in progress. Use /start to begin submitting a complaint.";
}

export function formatUnknownCommand(): string {
  return "❓ I don't understand that command.\n\nUse /start to begin submitting a complaint.";
}

export function formatHelp(): string {
  return (
    `\u{1F4D6} <b>Commands</b>\n` +
    DIVIDER +
    `\n\n/start — submit a new complaint (restarts any complaint in progress)\n` +
    `/cancel — abandon the complaint in progress\n` +
    `/mycomplaints — list your complaints and their status\n` +
    `/help — show this message`
  );
}

export function formatMyComplaints(complaints: Complaint[]): string {
  if (complaints.length === 0) {
    return "You have not submitted any complaints yet. Use /start to submit one.";
  }
  const lines = complaints.map(
    (c) =>
      `• <code>${formatComplaintId(c.id)}</code> ${escapeHtml(c.subject)} — ` +
      `${escapeHtml(c.lectureName)}: <b>${statusLabel(c.status)}</b>`
  );
  return `\u{1F4CB} <b>Your complaints</b>\n${DIVIDER}\n\n${lines.join("\n")}`;
}

export function formatStatusNotification(complaint: Complaint): string {
  return (
    `\u{1F4CA} <b>Complaint Status Updated</b>\n\n` +
    `\u{1F194} <b>Complaint ID:</b> <code>${formatComplaintId(complaint.id)}</code>\n` +
    `\u{1F4CA} <b>New Status:</b> ${statusLabel(complaint.status)}\n\n` +
    `Your complaint about:\n` +
    `• Subject: ${escapeHtml(complaint.subject)}\n` +
    `• Lecture: ${escapeHtml(complaint.lectureName)}\n\n` +
    `Thank you for your patience! \u{1F64F}`
  );
}

// ──────────────────────────────────────────────
// Reviewer-facing text
// ──────────────────────────────────────────────

export function formatReviewerCard(complaint: Complaint): string {
  const username = complaint.username ? `@${escapeHtml(complaint.username)}` : "No username";
  return (
    `\u{1F198} <b>New Complaint Submitted</b>\n\n` +
    `\u{1F464} <b>User Details:</b>\n` +
    `• User ID: <code>${complaint.userId}</code>\n` +
    `• Username: ${username}\n\n` +
    `\u{1F4DA} <b>Complaint Details:</b>\n` +
    `• Batch: ${escapeHtml(complaint.batch)}\n` +
    `• Subject: ${escapeHtml(complaint.subject)}\n` +
    `• Lecture Name: ${escapeHtml(complaint.lectureName)}\n\n` +
    `\u{1F4CA} <b>Status:</b> ${statusLabel(complaint.status)}\n` +
    `\u{1F194} <b>Complaint ID:</b> <code>${formatComplaintId(complaint.id)}</code>\n\n` +
    `Please review and update the status accordingly.`
  );
}

export function formatStatusUpdated(status: ComplaintStatus): string {
  return `✅ Status updated to: ${statusLabel(status)}`;
}

export function formatNotifyFailed(status: ComplaintStatus): string {
  return (
    `${formatStatusUpdated(status)}\n` +
    `⚠️ Could not notify user (user may have blocked the bot).`
  );
}

export function formatNotFound(complaintId: number): string {
  return `❌ Complaint <code>${formatComplaintId(complaintId)}</code> not found.`;
}

export const NOT_AUTHORIZED_TEXT = "❌ You are not authorized to perform this action.";
export const UNKNOWN_ACTION_TEXT = "❌ Unknown action.";

// ──────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────

export function formatComplaintId(id: number): string {
  return `complaint_${id}`;
}

/** "approved" → "Approved" */
export function statusLabel(status: ComplaintStatus): string {
  return status.charAt(0).toUpperCase() + status.slice(1);
}

/** Escape text for Telegram parse_mode: "HTML" */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
