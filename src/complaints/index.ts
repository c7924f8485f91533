/**
 * Complaint module public API.
 *
 * Usage in bot.ts:
 *
 *   import { ComplaintBot, TelegramGateway, toInboundEvent } from "./complaints/index.ts";
 *
 *   const complaints = new ComplaintBot({ gateway: new TelegramGateway(bot.api), reviewerId });
 *
 *   bot.on(["message", "callback_query:data"], async (ctx) => {
 *     const event = toInboundEvent(ctx);
 *     if (event) await complaints.handle(event);
 *   });
 */

export { ComplaintBot } from "./complaintBot.ts";
export type { ComplaintBotOptions, HandledEvent } from "./complaintBot.ts";
export { TelegramGateway, toInboundEvent } from "./telegramGateway.ts";
export type { MessagingGateway, DispatchReport } from "./dispatcher.ts";
export { NotificationFailedError, ConfigError } from "./errors.ts";
export type {
  Complaint,
  ComplaintStatus,
  DraftSession,
  FlowState,
  InboundEvent,
  OutboundAction,
} from "./types.ts";
