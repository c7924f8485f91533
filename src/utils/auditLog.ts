/**
 * Complaint lifecycle audit trail.
 *
 * Every event goes to the JSONL tracer. When Supabase is configured the
 * event is also inserted into the complaint_events table. Rows are written
 * for later inspection only; the bot never reads them back.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { ComplaintStatus } from "../complaints/types.ts";
import { trace } from "./tracer.ts";

export type ComplaintEvent =
  | { type: "complaint_created"; complaintId: number; userId: number }
  | { type: "complaint_status_changed"; complaintId: number; userId: number; status: ComplaintStatus }
  | { type: "draft_cancelled"; userId: number };

export type AuditLog = (event: ComplaintEvent) => void;

/**
 * Insert one event row.
 *
 * @returns true when the row was written
 */
export async function insertComplaintEvent(
  supabase: SupabaseClient | null,
  event: ComplaintEvent
): Promise<boolean> {
  if (!supabase) return false;
  const { error } = await supabase.from("complaint_events").insert({
    event_type: event.type,
    complaint_id: "complaintId" in event ? event.complaintId : null,
    user_id: event.userId,
    status: event.type === "complaint_status_changed" ? event.status : null,
    channel: "telegram",
  });
  if (error) {
    console.error("[audit] insert failed:", error.message);
    return false;
  }
  return true;
}

/** Fire-and-forget recorder: never blocks the caller, never throws. */
export function createAuditLog(supabase: SupabaseClient | null): AuditLog {
  return (event) => {
    trace({ event: event.type, ...event });
    if (!supabase) return;
    void insertComplaintEvent(supabase, event).catch((err) => {
      console.error("[audit] insert error:", err);
    });
  };
}
