import { describe, it, expect, vi } from "vitest";
import { NotificationDispatcher, type MessagingGateway } from "./dispatcher.ts";
import { NotificationFailedError } from "./errors.ts";
import type { OutboundAction } from "./types.ts";

vi.mock("../utils/tracer.ts", () => ({ trace: vi.fn() }));

function createGateway() {
  const calls: string[] = [];
  const gateway = {
    sendText: vi.fn(async (chatId: number, text: string) => {
      calls.push(`text:${chatId}:${text}`);
    }),
    sendPhoto: vi.fn(async (chatId: number, photo: string) => {
      calls.push(`photo:${chatId}:${photo}`);
    }),
    editText: vi.fn(async (message: { chatId: number; messageId: number }, text: string) => {
      calls.push(`edit:${message.messageId}:${text}`);
    }),
    answerCallback: vi.fn(async (callbackId: string) => {
      calls.push(`answer:${callbackId}`);
    }),
  } satisfies MessagingGateway;
  return { gateway, calls };
}

const blocked = new Error("Call to 'sendMessage' failed! (403: Forbidden: bot was blocked by the user)");

describe("NotificationDispatcher", () => {
  it("runs actions in order", async () => {
    const { gateway, calls } = createGateway();
    const dispatcher = new NotificationDispatcher(gateway);

    const report = await dispatcher.dispatch([
      { type: "answerCallback", callbackId: "cb-1" },
      { type: "sendText", chatId: 1, text: "hi" },
      { type: "sendPhoto", chatId: 2, photo: "file-1" },
      { type: "editText", message: { chatId: 2, messageId: 50 }, text: "card" },
    ]);

    expect(calls).toEqual(["answer:cb-1", "text:1:hi", "photo:2:file-1", "edit:50:card"]);
    expect(report.delivered).toHaveLength(4);
    expect(report.failed).toEqual([]);
  });

  it("sends the fallback when an action fails", async () => {
    const { gateway, calls } = createGateway();
    gateway.sendText.mockImplementationOnce(async () => {
      throw blocked;
    });
    const dispatcher = new NotificationDispatcher(gateway);
    const fallback: OutboundAction = { type: "sendText", chatId: 9000, text: "could not notify" };

    const report = await dispatcher.dispatch([
      { type: "sendText", chatId: 1001, text: "status changed", fallback },
    ]);

    expect(calls).toEqual(["text:9000:could not notify"]);
    expect(report.delivered).toEqual([fallback]);
    expect(report.failed).toHaveLength(1);
    const [failure] = report.failed;
    expect(failure).toBeInstanceOf(NotificationFailedError);
    expect(failure.message).toBe(
      "sendText failed: Call to 'sendMessage' failed! (403: Forbidden: bot was blocked by the user)"
    );
    expect(failure.cause).toBe(blocked);
  });

  it("keeps going after a failure with no fallback", async () => {
    const { gateway, calls } = createGateway();
    gateway.sendPhoto.mockRejectedValueOnce(new Error("wrong file identifier"));
    const dispatcher = new NotificationDispatcher(gateway);

    const report = await dispatcher.dispatch([
      { type: "sendPhoto", chatId: 9000, photo: "gone" },
      { type: "sendText", chatId: 9000, text: "card" },
    ]);

    expect(calls).toEqual(["text:9000:card"]);
    expect(report.failed.map((f) => f.message)).toEqual(["sendPhoto failed: wrong file identifier"]);
  });

  it("treats an unchanged card edit as delivered", async () => {
    const { gateway } = createGateway();
    gateway.editText.mockRejectedValueOnce(
      new Error("Call to 'editMessageText' failed! (400: Bad Request: message is not modified)")
    );
    const dispatcher = new NotificationDispatcher(gateway);

    const report = await dispatcher.dispatch([
      {
        type: "editText",
        message: { chatId: 9000, messageId: 77 },
        text: "card",
        fallback: { type: "sendText", chatId: 9000, text: "Status updated" },
      },
    ]);

    expect(gateway.sendText).not.toHaveBeenCalled();
    expect(report.failed).toEqual([]);
    expect(report.delivered).toHaveLength(1);
  });

  it("does not throw when the fallback fails too", async () => {
    const { gateway } = createGateway();
    gateway.sendText.mockRejectedValue(new Error("network down"));
    const dispatcher = new NotificationDispatcher(gateway);

    const report = await dispatcher.dispatch([
      { type: "sendText", chatId: 1, text: "a", fallback: { type: "sendText", chatId: 2, text: "b" } },
    ]);

    expect(report.delivered).toEqual([]);
    expect(report.failed).toHaveLength(2);
  });
});
