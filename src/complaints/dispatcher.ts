/**
 * Notification Dispatcher
 *
 * Runs outbound actions against the messaging gateway, in order. A failed
 * action does not stop the ones after it: the failure is logged, traced,
 * and the action's fallback (if any) is sent in its place.
 */

import type { InlineKeyboard } from "grammy";
import { trace } from "../utils/tracer.ts";
import { NotificationFailedError, isMessageNotModified } from "./errors.ts";
import type { MessageRef, OutboundAction } from "./types.ts";

export interface MessagingGateway {
  sendText(chatId: number, text: string, keyboard?: InlineKeyboard): Promise<void>;
  sendPhoto(chatId: number, photo: string, caption?: string): Promise<void>;
  editText(message: MessageRef, text: string, keyboard?: InlineKeyboard): Promise<void>;
  answerCallback(callbackId: string, text?: string, showAlert?: boolean): Promise<void>;
}

export interface DispatchReport {
  delivered: OutboundAction[];
  failed: NotificationFailedError[];
}

export class NotificationDispatcher {
  constructor(private gateway: MessagingGateway) {}

  /** Never throws. */
  async dispatch(actions: OutboundAction[]): Promise<DispatchReport> {
    const report: DispatchReport = { delivered: [], failed: [] };
    for (const action of actions) {
      await this.run(action, report);
    }
    return report;
  }

  private async run(action: OutboundAction, report: DispatchReport): Promise<void> {
    try {
      await this.send(action);
      report.delivered.push(action);
    } catch (err) {
      // Redrawing a card with identical content is a no-op, not a failure
      if (action.type === "editText" && isMessageNotModified(err)) {
        report.delivered.push(action);
        return;
      }

      const failure = new NotificationFailedError(action, err);
      console.error(`[dispatcher] ${failure.message}`);
      trace({ event: "notification_failed", action: action.type, target: targetOf(action), error: failure.message });
      report.failed.push(failure);

      if (action.type !== "answerCallback" && action.fallback) {
        await this.run(action.fallback, report);
      }
    }
  }

  private async send(action: OutboundAction): Promise<void> {
    switch (action.type) {
      case "sendText":
        return this.gateway.sendText(action.chatId, action.text, action.keyboard);
      case "sendPhoto":
        return this.gateway.sendPhoto(action.chatId, action.photo, action.caption);
      case "editText":
        return this.gateway.editText(action.message, action.text, action.keyboard);
      case "answerCallback":
        return this.gateway.answerCallback(action.callbackId, action.text, action.showAlert);
    }
  }
}

function targetOf(action: OutboundAction): number | string {
  switch (action.type) {
    case "sendText":
    case "sendPhoto":
      return action.chatId;
    case "editText":
      return action.message.chatId;
    case "answerCallback":
      return action.callbackId;
  }
}
