/**
 * Reviewer status workflow.
 *
 * Handles status:{id}:{status} button presses from the reviewer card. Any
 * status may follow any other; there is no transition table. Only the
 * configured reviewer may press these buttons.
 *
 * On success the submitter is notified and the reviewer card is redrawn.
 * Both messages carry fallbacks: if the submitter cannot be reached the
 * reviewer is told so, and the status change stands regardless.
 */

import type { Catalog } from "../config/catalog.ts";
import type { AuditLog } from "../utils/auditLog.ts";
import type { ComplaintStore } from "./complaintStore.ts";
import {
  NOT_AUTHORIZED_TEXT,
  UNKNOWN_ACTION_TEXT,
  buildStatusKeyboard,
  formatNotFound,
  formatNotifyFailed,
  formatReviewerCard,
  formatStatusNotification,
  formatStatusUpdated,
  parseCallbackData,
} from "./complaintCard.ts";
import { isComplaintStatus, type EventOf, type OutboundAction, type WorkflowResult } from "./types.ts";

export interface StatusWorkflowDeps {
  complaints: ComplaintStore;
  catalog: Catalog;
  reviewerId: number;
  audit?: AuditLog;
}

export class StatusWorkflow {
  constructor(private deps: StatusWorkflowDeps) {}

  isReviewer(userId: number): boolean {
    return userId === this.deps.reviewerId;
  }

  handle(event: EventOf<"button">): WorkflowResult {
    const { callbackId, chatId, actor } = event;

    if (!this.isReviewer(actor.id)) {
      console.warn(`[status] unauthorized status change attempt by ${actor.id}`);
      return {
        outcome: "unauthorized",
        actions: [{ type: "answerCallback", callbackId, text: NOT_AUTHORIZED_TEXT, showAlert: true }],
      };
    }

    const action = parseCallbackData(event.data);
    if (action.kind !== "status" || !isComplaintStatus(action.status)) {
      return {
        outcome: "validation_rejected",
        actions: [{ type: "answerCallback", callbackId, text: UNKNOWN_ACTION_TEXT }],
      };
    }

    const { complaintId, status } = action;
    const { complaints, catalog, audit } = this.deps;

    const complaint = complaints.setStatus(complaintId, status) ? complaints.get(complaintId) : undefined;
    if (!complaint) {
      return {
        outcome: "not_found",
        actions: [
          { type: "answerCallback", callbackId },
          { type: "sendText", chatId, text: formatNotFound(complaintId) },
        ],
      };
    }

    console.log(`[status] complaint #${complaintId} → ${status}`);
    audit?.({ type: "complaint_status_changed", complaintId, userId: complaint.userId, status });

    const card = formatReviewerCard(complaint);
    const keyboard = buildStatusKeyboard(complaintId, catalog);

    const refresh: OutboundAction = event.message
      ? {
          type: "editText",
          message: event.message,
          text: card,
          keyboard,
          fallback: { type: "sendText", chatId, text: formatStatusUpdated(status) },
        }
      : { type: "sendText", chatId, text: card, keyboard };

    return {
      outcome: "updated",
      complaint,
      actions: [
        { type: "answerCallback", callbackId },
        {
          type: "sendText",
          chatId: complaint.chatId,
          text: formatStatusNotification(complaint),
          fallback: { type: "sendText", chatId, text: formatNotifyFailed(status) },
        },
        refresh,
      ],
    };
  }
}
