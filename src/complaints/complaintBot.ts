/**
 * Wires stores, state machine, workflow, router and dispatcher together.
 *
 * The stores are created here and owned by the returned instance; tests
 * and the grammy entry point reach them through `drafts` / `complaints`.
 */

import { DEFAULT_CATALOG, type Catalog } from "../config/catalog.ts";
import type { AuditLog } from "../utils/auditLog.ts";
import { ComplaintStore } from "./complaintStore.ts";
import { NotificationDispatcher, type DispatchReport, type MessagingGateway } from "./dispatcher.ts";
import { DraftStore } from "./draftStore.ts";
import { UpdateRouter, actionsOf, type RouteResult } from "./router.ts";
import { ConversationStateMachine } from "./stateMachine.ts";
import { StatusWorkflow } from "./statusWorkflow.ts";
import type { InboundEvent } from "./types.ts";

export interface ComplaintBotOptions {
  gateway: MessagingGateway;
  /** Privileged user; their private chat also receives new complaints */
  reviewerId: number;
  catalog?: Catalog;
  audit?: AuditLog;
  now?: () => number;
}

export type HandledEvent = RouteResult & { report: DispatchReport };

export class ComplaintBot {
  readonly drafts = new DraftStore();
  readonly complaints: ComplaintStore;
  readonly conversation: ConversationStateMachine;
  readonly workflow: StatusWorkflow;
  private router: UpdateRouter;
  private dispatcher: NotificationDispatcher;

  constructor(options: ComplaintBotOptions) {
    const catalog = options.catalog ?? DEFAULT_CATALOG;
    this.complaints = new ComplaintStore(options.now);
    this.conversation = new ConversationStateMachine({
      drafts: this.drafts,
      complaints: this.complaints,
      catalog,
      reviewerChatId: options.reviewerId,
      audit: options.audit,
      now: options.now,
    });
    this.workflow = new StatusWorkflow({
      complaints: this.complaints,
      catalog,
      reviewerId: options.reviewerId,
      audit: options.audit,
    });
    this.router = new UpdateRouter(this.conversation, this.workflow);
    this.dispatcher = new NotificationDispatcher(options.gateway);
  }

  async handle(event: InboundEvent): Promise<HandledEvent> {
    const routed = this.router.route(event);
    const report = await this.dispatcher.dispatch(actionsOf(routed));
    return { ...routed, report };
  }
}
