/**
 * Per-user depot storage.
 *
 * The first depot a user sets creates their session; every later set
 * overwrites it. The interface is async so a shared store (Redis, SQL) can
 * replace the in-memory one without touching callers.
 */

import type { LabeledPoint } from "@stopwise/types";

export interface StoredDepot {
  userId: string;
  depot: LabeledPoint;
  updatedAt: Date;
}

export interface DepotStore {
  get(userId: string): Promise<StoredDepot | undefined>;
  /** Create or overwrite the user's depot */
  set(userId: string, depot: LabeledPoint): Promise<StoredDepot>;
  /** @returns true if a depot was removed */
  delete(userId: string): Promise<boolean>;
  /** Number of users with a depot */
  size(): Promise<number>;
}

/** Process-local store; contents are lost on restart. */
export class InMemoryDepotStore implements DepotStore {
  private readonly depots = new Map<string, StoredDepot>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(userId: string): Promise<StoredDepot | undefined> {
    return this.depots.get(userId);
  }

  async set(userId: string, depot: LabeledPoint): Promise<StoredDepot> {
    const entry: StoredDepot = { userId, depot, updatedAt: this.now() };
    this.depots.set(userId, entry);
    return entry;
  }

  async delete(userId: string): Promise<boolean> {
    return this.depots.delete(userId);
  }

  async size(): Promise<number> {
    return this.depots.size;
  }
}

export class DepotNotSetError extends Error {
  readonly status = 404;

  constructor(readonly userId: string) {
    super(`No depot set for user ${userId}`);
    this.name = "DepotNotSetError";
  }
}
