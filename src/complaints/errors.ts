import type { OutboundAction } from "./types.ts";

/** A gateway call for an outbound action failed. Never fatal. */
export class NotificationFailedError extends Error {
  constructor(
    readonly action: OutboundAction,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${action.type} failed: ${reason}`, { cause });
    this.name = "NotificationFailedError";
  }
}

/** Missing or malformed startup configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Telegram rejects edits whose text and markup are unchanged */
export function isMessageNotModified(err: unknown): boolean {
  return err instanceof Error && /message is not modified/i.test(err.message);
}
