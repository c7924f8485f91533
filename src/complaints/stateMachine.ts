/**
 * Complaint Submission State Machine
 *
 * Drives one user through the submission flow:
 *   1. /start          → awaiting_batch (any previous draft discarded)
 *   2. Batch button    → awaiting_subject
 *   3. Subject button  → awaiting_lecture_name
 *   4. Lecture text    → awaiting_photo
 *   5. Photo           → complaint created, draft destroyed, reviewer notified
 *
 * /cancel or the Cancel button drops the draft at any step. Start Over
 * returns to batch selection with an empty draft.
 *
 * Input that does not fit the current step gets a re-prompt and leaves the
 * draft untouched. Stale buttons (from an earlier step or a finished draft)
 * are acknowledged and otherwise ignored.
 *
 * handle() performs no I/O: it reads and writes the injected stores and
 * returns the messages to send.
 */

import type { InlineKeyboard } from "grammy";
import type { Catalog } from "../config/catalog.ts";
import type { AuditLog } from "../utils/auditLog.ts";
import type { ComplaintStore } from "./complaintStore.ts";
import type { DraftStore } from "./draftStore.ts";
import {
  buildBatchKeyboard,
  buildFlowNavKeyboard,
  buildStatusKeyboard,
  buildSubjectKeyboard,
  formatBatchSelected,
  formatCancelled,
  formatHelp,
  formatLectureSaved,
  formatMyComplaints,
  formatNothingToCancel,
  formatRestart,
  formatReviewerCard,
  formatStepReminder,
  formatSubjectSelected,
  formatSubmitted,
  formatUnknownCommand,
  formatWelcome,
  parseCallbackData,
} from "./complaintCard.ts";
import type {
  DraftSession,
  EventOf,
  FlowResult,
  FlowState,
  InboundEvent,
  OutboundAction,
  PhotoVariant,
} from "./types.ts";

export interface ConversationDeps {
  drafts: DraftStore;
  complaints: ComplaintStore;
  catalog: Catalog;
  /** Chat that receives new complaints */
  reviewerChatId: number;
  audit?: AuditLog;
  now?: () => number;
}

export class ConversationStateMachine {
  private now: () => number;

  constructor(private deps: ConversationDeps) {
    this.now = deps.now ?? Date.now;
  }

  stateOf(userId: number): FlowState {
    return this.deps.drafts.get(userId)?.step ?? "terminal";
  }

  handle(event: InboundEvent): FlowResult {
    switch (event.kind) {
      case "command":
        return this.handleCommand(event);
      case "button":
        return this.handleButton(event);
      case "text":
        return this.handleText(event);
      case "photo":
        return this.handlePhoto(event);
      case "attachment":
        return this.handleAttachment(event);
    }
  }

  // ──────────────────────────────────────────────
  // Commands
  // ──────────────────────────────────────────────

  private handleCommand(event: EventOf<"command">): FlowResult {
    const { actor, chatId } = event;

    switch (event.command) {
      case "start":
        return this.start(event, formatWelcome(actor.firstName));

      case "cancel": {
        const draft = this.deps.drafts.get(actor.id);
        if (!draft) return this.reply("terminal", chatId, formatNothingToCancel());
        return this.cancel(draft, []);
      }

      case "help":
        return this.reply(this.stateOf(actor.id), chatId, formatHelp());

      case "mycomplaints":
        return this.reply(
          this.stateOf(actor.id),
          chatId,
          formatMyComplaints(this.deps.complaints.listByUser(actor.id))
        );

      default:
        return this.reply(this.stateOf(actor.id), chatId, formatUnknownCommand());
    }
  }

  // ──────────────────────────────────────────────
  // Button presses (batch:*, subject:*, flow:*)
  // ──────────────────────────────────────────────

  private handleButton(event: EventOf<"button">): FlowResult {
    const ack: OutboundAction = { type: "answerCallback", callbackId: event.callbackId };
    const draft = this.deps.drafts.get(event.actor.id);
    if (!draft) return { state: "terminal", actions: [ack] };

    const action = parseCallbackData(event.data);
    const { catalog } = this.deps;

    switch (action.kind) {
      case "restart":
        return this.start(event, formatRestart(), [ack]);

      case "cancel":
        return this.cancel(draft, [ack]);

      case "batch": {
        const batch = catalog.batches[action.index];
        if (draft.step !== "awaiting_batch" || batch === undefined) break;
        this.deps.drafts.set(draft.userId, { ...draft, step: "awaiting_subject", batch });
        return {
          state: "awaiting_subject",
          actions: [ack, this.text(draft.chatId, formatBatchSelected(batch), buildSubjectKeyboard(catalog))],
        };
      }

      case "subject": {
        const subject = catalog.subjects[action.index];
        if (draft.step !== "awaiting_subject" || subject === undefined) break;
        this.deps.drafts.set(draft.userId, { ...draft, step: "awaiting_lecture_name", subject });
        return {
          state: "awaiting_lecture_name",
          actions: [
            ack,
            this.text(draft.chatId, formatSubjectSelected(draft.batch, subject), buildFlowNavKeyboard()),
          ],
        };
      }

      case "status":
      case "unknown":
        break;
    }

    // Stale or foreign button: acknowledge only
    return { state: draft.step, actions: [ack] };
  }

  // ──────────────────────────────────────────────
  // Free text
  // ──────────────────────────────────────────────

  private handleText(event: EventOf<"text">): FlowResult {
    const draft = this.deps.drafts.get(event.actor.id);
    if (!draft) return { state: "terminal", actions: [] };
    if (draft.step !== "awaiting_lecture_name") return this.remind(draft);

    const lectureName = event.text.trim();
    if (!lectureName) return this.remind(draft);

    this.deps.drafts.set(draft.userId, { ...draft, step: "awaiting_photo", lectureName });
    return {
      state: "awaiting_photo",
      actions: [
        this.text(
          draft.chatId,
          formatLectureSaved(draft.batch, draft.subject, lectureName),
          buildFlowNavKeyboard()
        ),
      ],
    };
  }

  // ──────────────────────────────────────────────
  // Photos and other attachments
  // ──────────────────────────────────────────────

  private handlePhoto(event: EventOf<"photo">): FlowResult {
    const draft = this.deps.drafts.get(event.actor.id);
    if (!draft) return { state: "terminal", actions: [] };
    if (draft.step !== "awaiting_photo") return this.remind(draft);

    const photo = selectLargestPhoto(event.variants);
    if (!photo) return this.remind(draft);

    const { complaints, drafts, catalog, reviewerChatId, audit } = this.deps;
    const complaint = complaints.create({
      userId: draft.userId,
      chatId: draft.chatId,
      username: event.actor.username ?? draft.username,
      batch: draft.batch,
      subject: draft.subject,
      lectureName: draft.lectureName,
      photoFileId: photo.fileId,
    });
    drafts.clear(draft.userId);

    console.log(`[complaints] created #${complaint.id} for user ${complaint.userId}`);
    audit?.({ type: "complaint_created", complaintId: complaint.id, userId: complaint.userId });

    return {
      state: "terminal",
      created: complaint,
      actions: [
        this.text(draft.chatId, formatSubmitted(complaint)),
        { type: "sendPhoto", chatId: reviewerChatId, photo: complaint.photoFileId },
        this.text(reviewerChatId, formatReviewerCard(complaint), buildStatusKeyboard(complaint.id, catalog)),
      ],
    };
  }

  private handleAttachment(event: EventOf<"attachment">): FlowResult {
    const draft = this.deps.drafts.get(event.actor.id);
    if (!draft) return { state: "terminal", actions: [] };
    return this.remind(draft);
  }

  // ──────────────────────────────────────────────
  // Internal actions
  // ──────────────────────────────────────────────

  /** Fresh awaiting_batch draft; whatever was collected before is dropped. */
  private start(
    event: EventOf<"command"> | EventOf<"button">,
    text: string,
    leading: OutboundAction[] = []
  ): FlowResult {
    const { actor, chatId } = event;
    this.deps.drafts.set(actor.id, {
      step: "awaiting_batch",
      userId: actor.id,
      chatId,
      username: actor.username,
      startedAt: this.now(),
    });
    return {
      state: "awaiting_batch",
      actions: [...leading, this.text(chatId, text, buildBatchKeyboard(this.deps.catalog))],
    };
  }

  private cancel(draft: DraftSession, leading: OutboundAction[]): FlowResult {
    this.deps.drafts.clear(draft.userId);
    this.deps.audit?.({ type: "draft_cancelled", userId: draft.userId });
    return { state: "terminal", actions: [...leading, this.text(draft.chatId, formatCancelled())] };
  }

  /** Re-prompt for the current step; the draft is not touched. */
  private remind(draft: DraftSession): FlowResult {
    return {
      state: draft.step,
      actions: [this.text(draft.chatId, formatStepReminder(draft.step), this.keyboardFor(draft))],
    };
  }

  private keyboardFor(draft: DraftSession): InlineKeyboard {
    switch (draft.step) {
      case "awaiting_batch":
        return buildBatchKeyboard(this.deps.catalog);
      case "awaiting_subject":
        return buildSubjectKeyboard(this.deps.catalog);
      case "awaiting_lecture_name":
      case "awaiting_photo":
        return buildFlowNavKeyboard();
    }
  }

  private reply(state: FlowState, chatId: number, text: string): FlowResult {
    return { state, actions: [this.text(chatId, text)] };
  }

  private text(chatId: number, text: string, keyboard?: InlineKeyboard): OutboundAction {
    return keyboard ? { type: "sendText", chatId, text, keyboard } : { type: "sendText", chatId, text };
  }
}

// ──────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────

/** Largest variant by pixel area; on a tie the later one (Telegram lists ascending) wins. */
export function selectLargestPhoto(variants: PhotoVariant[]): PhotoVariant | undefined {
  let best: PhotoVariant | undefined;
  for (const v of variants) {
    if (!best || v.width * v.height >= best.width * best.height) best = v;
  }
  return best;
}
