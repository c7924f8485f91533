/**
 * In-memory store for in-progress complaint drafts.
 *
 * One draft per user id. Nothing survives a restart.
 */

import type { DraftSession } from "./types.ts";

export class DraftStore {
  private drafts = new Map<number, DraftSession>();

  set(userId: number, draft: DraftSession): void {
    this.drafts.set(userId, draft);
  }

  get(userId: number): DraftSession | undefined {
    return this.drafts.get(userId);
  }

  clear(userId: number): boolean {
    return this.drafts.delete(userId);
  }

  has(userId: number): boolean {
    return this.drafts.has(userId);
  }

  get size(): number {
    return this.drafts.size;
  }
}
