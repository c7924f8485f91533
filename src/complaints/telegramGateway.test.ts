import { describe, it, expect, vi } from "vitest";
import { InlineKeyboard, type Api } from "grammy";
import { TelegramGateway, toInboundEvent, type UpdateLike } from "./telegramGateway.ts";

const from = { id: 1001, username: "asha_s", first_name: "Asha" };
const chat = { id: 1001 };
const actor = { id: 1001, username: "asha_s", firstName: "Asha" };

describe("toInboundEvent", () => {
  it("maps /start to a command event", () => {
    expect(toInboundEvent({ from, chat, message: { text: "/start" } })).toEqual({
      kind: "command",
      command: "start",
      args: "",
      actor,
      chatId: 1001,
    });
  });

  it("strips the bot mention and keeps arguments", () => {
    const event = toInboundEvent({ from, chat, message: { text: "/START@LectureComplaintBot  deep link " } });
    expect(event).toMatchObject({ kind: "command", command: "start", args: "deep link" });
  });

  it("maps ordinary text to a text event", () => {
    expect(toInboundEvent({ from, chat, message: { text: "Linear Equations Lecture 3" } })).toEqual({
      kind: "text",
      text: "Linear Equations Lecture 3",
      actor,
      chatId: 1001,
    });
  });

  it("maps photo sizes to variants", () => {
    const update: UpdateLike = {
      from,
      chat,
      message: {
        photo: [
          { file_id: "s", width: 90, height: 90, file_size: 1200 },
          { file_id: "l", width: 800, height: 800 },
        ],
      },
    };
    expect(toInboundEvent(update)).toEqual({
      kind: "photo",
      variants: [
        { fileId: "s", width: 90, height: 90, fileSize: 1200 },
        { fileId: "l", width: 800, height: 800, fileSize: undefined },
      ],
      actor,
      chatId: 1001,
    });
  });

  it("maps documents and stickers to attachment events", () => {
    expect(toInboundEvent({ from, chat, message: { document: {} } })).toMatchObject({
      kind: "attachment",
      attachmentType: "document",
    });
    expect(toInboundEvent({ from, chat, message: { sticker: {} } })).toMatchObject({
      kind: "attachment",
      attachmentType: "sticker",
    });
  });

  it("maps a callback query to a button event with the card reference", () => {
    const event = toInboundEvent({
      from,
      chat: { id: 9000 },
      callbackQuery: { id: "cq-1", data: "status:7:seen", message: { message_id: 55, chat: { id: 9000 } } },
    });
    expect(event).toEqual({
      kind: "button",
      data: "status:7:seen",
      callbackId: "cq-1",
      message: { chatId: 9000, messageId: 55 },
      actor,
      chatId: 9000,
    });
  });

  it("ignores updates it cannot route", () => {
    expect(toInboundEvent({ chat, message: { text: "/start" } })).toBeUndefined();
    expect(toInboundEvent({ from, chat, callbackQuery: { id: "cq-2" } })).toBeUndefined();
    expect(toInboundEvent({ from, chat, message: {} })).toBeUndefined();
  });
});

describe("TelegramGateway", () => {
  function createApi() {
    return {
      sendMessage: vi.fn(async () => ({ message_id: 1 })),
      sendPhoto: vi.fn(async () => ({ message_id: 2 })),
      editMessageText: vi.fn(async () => true),
      answerCallbackQuery: vi.fn(async () => true),
    };
  }

  it("sends HTML text with the keyboard attached", async () => {
    const api = createApi();
    const gateway = new TelegramGateway(api as unknown as Api);
    const kb = new InlineKeyboard().text("Seen", "status:1:seen");

    await gateway.sendText(1001, "<b>hi</b>", kb);

    expect(api.sendMessage).toHaveBeenCalledWith(1001, "<b>hi</b>", { parse_mode: "HTML", reply_markup: kb });
  });

  it("sends photos by file id", async () => {
    const api = createApi();
    await new TelegramGateway(api as unknown as Api).sendPhoto(9000, "file-abc");
    expect(api.sendPhoto).toHaveBeenCalledWith(9000, "file-abc", undefined);
  });

  it("edits the referenced message", async () => {
    const api = createApi();
    await new TelegramGateway(api as unknown as Api).editText({ chatId: 9000, messageId: 55 }, "card");
    expect(api.editMessageText).toHaveBeenCalledWith(9000, 55, "card", {
      parse_mode: "HTML",
      reply_markup: undefined,
    });
  });

  it("answers callback queries with an optional alert", async () => {
    const api = createApi();
    await new TelegramGateway(api as unknown as Api).answerCallback("cq-1", "denied", true);
    expect(api.answerCallbackQuery).toHaveBeenCalledWith("cq-1", { text: "denied", show_alert: true });
  });
});
