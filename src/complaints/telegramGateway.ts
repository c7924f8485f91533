/**
 * grammy glue.
 *
 * TelegramGateway implements MessagingGateway on top of bot.api, and
 * toInboundEvent turns an incoming update into an InboundEvent. Updates
 * the flow has no use for (service messages, channel posts, updates
 * without a sender) map to undefined.
 */

import type { Api, InlineKeyboard } from "grammy";
import type { MessagingGateway } from "./dispatcher.ts";
import type { InboundEvent, MessageRef } from "./types.ts";

export class TelegramGateway implements MessagingGateway {
  constructor(private api: Api) {}

  async sendText(chatId: number, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.api.sendMessage(chatId, text, { parse_mode: "HTML", reply_markup: keyboard });
  }

  async sendPhoto(chatId: number, photo: string, caption?: string): Promise<void> {
    await this.api.sendPhoto(chatId, photo, caption ? { caption, parse_mode: "HTML" } : undefined);
  }

  async editText(message: MessageRef, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.api.editMessageText(message.chatId, message.messageId, text, {
      parse_mode: "HTML",
      reply_markup: keyboard,
    });
  }

  async answerCallback(callbackId: string, text?: string, showAlert?: boolean): Promise<void> {
    await this.api.answerCallbackQuery(callbackId, { text, show_alert: showAlert });
  }
}

// ──────────────────────────────────────────────
// Update → InboundEvent
// ──────────────────────────────────────────────

/** Message kinds rejected as "not a screenshot" */
const ATTACHMENT_KINDS = [
  "document",
  "video",
  "animation",
  "audio",
  "voice",
  "video_note",
  "sticker",
  "location",
  "contact",
] as const;

type AttachmentKind = (typeof ATTACHMENT_KINDS)[number];

/** The slice of grammy's Context this adapter reads */
export interface UpdateLike {
  from?: { id: number; username?: string; first_name?: string };
  chat?: { id: number };
  message?: {
    text?: string;
    photo?: { file_id: string; width: number; height: number; file_size?: number }[];
  } & Partial<Record<AttachmentKind, object>>;
  callbackQuery?: {
    id: string;
    data?: string;
    message?: { message_id: number; chat: { id: number } };
  };
}

const COMMAND_RE = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export function toInboundEvent(update: UpdateLike): InboundEvent | undefined {
  const { from, chat } = update;
  if (!from || !chat) return undefined;

  const actor = { id: from.id, username: from.username, firstName: from.first_name };
  const base = { actor, chatId: chat.id };

  const cq = update.callbackQuery;
  if (cq) {
    if (cq.data === undefined) return undefined;
    const message: MessageRef | undefined = cq.message
      ? { chatId: cq.message.chat.id, messageId: cq.message.message_id }
      : undefined;
    return { ...base, kind: "button", data: cq.data, callbackId: cq.id, message };
  }

  const msg = update.message;
  if (!msg) return undefined;

  if (msg.text !== undefined) {
    const cmd = COMMAND_RE.exec(msg.text);
    if (cmd) {
      return { ...base, kind: "command", command: cmd[1].toLowerCase(), args: (cmd[2] ?? "").trim() };
    }
    return { ...base, kind: "text", text: msg.text };
  }

  if (msg.photo && msg.photo.length > 0) {
    return {
      ...base,
      kind: "photo",
      variants: msg.photo.map((p) => ({
        fileId: p.file_id,
        width: p.width,
        height: p.height,
        fileSize: p.file_size,
      })),
    };
  }

  const attachment = ATTACHMENT_KINDS.find((k) => msg[k] !== undefined);
  if (attachment) return { ...base, kind: "attachment", attachmentType: attachment };

  return undefined;
}
