/**
 * In-memory complaint registry.
 *
 * Ids start at 1 and are never reused for the lifetime of the process.
 * Records are never deleted; only `status` changes after creation.
 */

import type { Complaint, ComplaintStatus, NewComplaint } from "./types.ts";

export class ComplaintStore {
  private complaints = new Map<number, Complaint>();
  private lastId = 0;

  constructor(private now: () => number = Date.now) {}

  create(input: NewComplaint): Complaint {
    const id = ++this.lastId;
    const ts = this.now();
    const complaint: Complaint = {
      ...input,
      id,
      status: "submitted",
      createdAt: ts,
      updatedAt: ts,
    };
    this.complaints.set(id, complaint);
    return complaint;
  }

  get(id: number): Complaint | undefined {
    return this.complaints.get(id);
  }

  /** Overwrites the status. Returns false when the id is unknown. */
  setStatus(id: number, status: ComplaintStatus): boolean {
    const existing = this.complaints.get(id);
    if (!existing) return false;
    this.complaints.set(id, { ...existing, status, updatedAt: this.now() });
    return true;
  }

  listByUser(userId: number): Complaint[] {
    return [...this.complaints.values()]
      .filter((c) => c.userId === userId)
      .sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this.complaints.size;
  }
}
