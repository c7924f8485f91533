/**
 * Type definitions for the complaint submission flow and review workflow.
 */

import type { InlineKeyboard } from "grammy";

// ──────────────────────────────────────────────
// Complaints
// ──────────────────────────────────────────────

export const COMPLAINT_STATUSES = ["submitted", "send", "seen", "approved", "resolved"] as const;

export type ComplaintStatus = (typeof COMPLAINT_STATUSES)[number];

export function isComplaintStatus(value: string): value is ComplaintStatus {
  return COMPLAINT_STATUSES.some((s) => s === value);
}

export interface Complaint {
  id: number;
  userId: number;
  chatId: number;           // submitter's private chat; status notifications go here
  username?: string;
  batch: string;
  subject: string;
  lectureName: string;
  photoFileId: string;      // largest PhotoSize variant
  status: ComplaintStatus;
  createdAt: number;
  updatedAt: number;
}

export type NewComplaint = Omit<Complaint, "id" | "status" | "createdAt" | "updatedAt">;

// ──────────────────────────────────────────────
// Draft sessions
// ──────────────────────────────────────────────

/** Steps of the submission flow, in order */
export type DraftStep =
  | "awaiting_batch"
  | "awaiting_subject"
  | "awaiting_lecture_name"
  | "awaiting_photo";

/** A user without a draft is in the terminal state */
export type FlowState = DraftStep | "terminal";

interface DraftBase {
  userId: number;
  chatId: number;
  username?: string;
  startedAt: number;
}

/**
 * One variant per step. Each variant carries exactly the fields collected
 * before it, so a later field can never be set while an earlier one is missing.
 */
export type DraftSession =
  | (DraftBase & { step: "awaiting_batch" })
  | (DraftBase & { step: "awaiting_subject"; batch: string })
  | (DraftBase & { step: "awaiting_lecture_name"; batch: string; subject: string })
  | (DraftBase & { step: "awaiting_photo"; batch: string; subject: string; lectureName: string });

/** Flat view of a draft session, fields unset until their step is passed */
export interface Draft {
  userId: number;
  batch?: string;
  subject?: string;
  lectureName?: string;
}

export function toDraft(session: DraftSession): Draft {
  switch (session.step) {
    case "awaiting_batch":
      return { userId: session.userId };
    case "awaiting_subject":
      return { userId: session.userId, batch: session.batch };
    case "awaiting_lecture_name":
      return { userId: session.userId, batch: session.batch, subject: session.subject };
    case "awaiting_photo":
      return {
        userId: session.userId,
        batch: session.batch,
        subject: session.subject,
        lectureName: session.lectureName,
      };
  }
}

// ──────────────────────────────────────────────
// Inbound events (gateway → core)
// ──────────────────────────────────────────────

export interface Actor {
  id: number;
  username?: string;
  firstName?: string;
}

export interface MessageRef {
  chatId: number;
  messageId: number;
}

export interface PhotoVariant {
  fileId: string;
  width: number;
  height: number;
  fileSize?: number;
}

interface EventBase {
  actor: Actor;
  chatId: number;
}

export type InboundEvent =
  | (EventBase & { kind: "command"; command: string; args: string })
  | (EventBase & { kind: "text"; text: string })
  | (EventBase & { kind: "button"; data: string; callbackId: string; message?: MessageRef })
  | (EventBase & { kind: "photo"; variants: PhotoVariant[] })
  | (EventBase & { kind: "attachment"; attachmentType: string });

export type EventOf<K extends InboundEvent["kind"]> = Extract<InboundEvent, { kind: K }>;

// ──────────────────────────────────────────────
// Outbound actions (core → dispatcher)
// ──────────────────────────────────────────────

/**
 * Actions carry an optional fallback, sent in their place when the
 * gateway call fails.
 */
export type OutboundAction =
  | { type: "sendText"; chatId: number; text: string; keyboard?: InlineKeyboard; fallback?: OutboundAction }
  | { type: "sendPhoto"; chatId: number; photo: string; caption?: string; fallback?: OutboundAction }
  | { type: "editText"; message: MessageRef; text: string; keyboard?: InlineKeyboard; fallback?: OutboundAction }
  | { type: "answerCallback"; callbackId: string; text?: string; showAlert?: boolean };

export interface FlowResult {
  state: FlowState;
  actions: OutboundAction[];
  created?: Complaint;
}

export type WorkflowOutcome = "updated" | "validation_rejected" | "unauthorized" | "not_found";

export interface WorkflowResult {
  outcome: WorkflowOutcome;
  actions: OutboundAction[];
  complaint?: Complaint;
}
