/**
 * Tests for the complaint audit trail.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createAuditLog, insertComplaintEvent } from "./auditLog.ts";
import { trace } from "./tracer.ts";

vi.mock("./tracer.ts", () => ({ trace: vi.fn() }));

function createSupabase(result: { error: { message: string } | null } = { error: null }) {
  const insert = vi.fn(async (_row: Record<string, unknown>) => result);
  const from = vi.fn((_table: string) => ({ insert }));
  const supabase = { from } as unknown as SupabaseClient;
  return { supabase, from, insert };
}

afterEach(() => {
  vi.clearAllMocks();
  vi.restoreAllMocks();
});

describe("insertComplaintEvent", () => {
  it("writes a status change into complaint_events", async () => {
    const { supabase, from, insert } = createSupabase();

    const ok = await insertComplaintEvent(supabase, {
      type: "complaint_status_changed",
      complaintId: 7,
      userId: 1001,
      status: "approved",
    });

    expect(ok).toBe(true);
    expect(from).toHaveBeenCalledWith("complaint_events");
    expect(insert).toHaveBeenCalledWith({
      event_type: "complaint_status_changed",
      complaint_id: 7,
      user_id: 1001,
      status: "approved",
      channel: "telegram",
    });
  });

  it("stores nulls for fields an event does not carry", async () => {
    const { supabase, insert } = createSupabase();

    await insertComplaintEvent(supabase, { type: "draft_cancelled", userId: 1002 });

    expect(insert).toHaveBeenCalledWith({
      event_type: "draft_cancelled",
      complaint_id: null,
      user_id: 1002,
      status: null,
      channel: "telegram",
    });
  });

  it("returns false when the insert reports an error", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { supabase } = createSupabase({ error: { message: "relation does not exist" } });

    expect(await insertComplaintEvent(supabase, { type: "draft_cancelled", userId: 1 })).toBe(false);
    expect(error).toHaveBeenCalledWith("[audit] insert failed:", "relation does not exist");
  });

  it("is a no-op without a client", async () => {
    expect(await insertComplaintEvent(null, { type: "draft_cancelled", userId: 1 })).toBe(false);
  });
});

describe("createAuditLog", () => {
  it("traces every event", () => {
    const audit = createAuditLog(null);
    audit({ type: "complaint_created", complaintId: 3, userId: 1001 });

    expect(trace).toHaveBeenCalledWith({
      event: "complaint_created",
      type: "complaint_created",
      complaintId: 3,
      userId: 1001,
    });
  });

  it("also inserts the event when Supabase is configured", () => {
    const { supabase, insert } = createSupabase();
    createAuditLog(supabase)({ type: "complaint_created", complaintId: 3, userId: 1001 });

    expect(insert).toHaveBeenCalledTimes(1);
  });

  it("does not throw when the insert rejects", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { supabase, insert } = createSupabase();
    insert.mockRejectedValueOnce(new Error("network down"));

    expect(() => createAuditLog(supabase)({ type: "draft_cancelled", userId: 1 })).not.toThrow();
    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));
  });
});
