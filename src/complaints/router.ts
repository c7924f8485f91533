/**
 * Sends reviewer status buttons to the StatusWorkflow and everything else
 * to the per-user ConversationStateMachine.
 */

import { isStatusData } from "./complaintCard.ts";
import type { ConversationStateMachine } from "./stateMachine.ts";
import type { StatusWorkflow } from "./statusWorkflow.ts";
import type { FlowResult, InboundEvent, OutboundAction, WorkflowResult } from "./types.ts";

export type RouteResult =
  | { target: "conversation"; result: FlowResult }
  | { target: "workflow"; result: WorkflowResult };

export class UpdateRouter {
  constructor(
    private conversation: ConversationStateMachine,
    private workflow: StatusWorkflow
  ) {}

  route(event: InboundEvent): RouteResult {
    if (event.kind === "button" && isStatusData(event.data)) {
      return { target: "workflow", result: this.workflow.handle(event) };
    }
    return { target: "conversation", result: this.conversation.handle(event) };
  }
}

export function actionsOf(routed: RouteResult): OutboundAction[] {
  return routed.result.actions;
}
