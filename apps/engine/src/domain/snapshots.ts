import type { DraftStatus } from "@draftwire/shared";

export type Pick = {
  pickNumber: number;
  playerId: string;
  teamId: string;
  rosterPosition: string;
  timestamp: string;
};

export type RosterView = Readonly<Record<string, readonly string[]>>;

export type DraftStateSnapshot = {
  readonly takenAt: string;
  readonly status: DraftStatus;
  readonly draftedPlayers: readonly string[];
  readonly availablePlayers: readonly string[];
  readonly myRoster: RosterView;
  readonly otherRosters: Readonly<Record<string, RosterView>>;
  readonly currentPick: number;
  /** Picks known to have happened while the feed was down, never seen as frames. */
  readonly missedPicks: number;
  readonly picksUntilNext: number;
  readonly timeRemaining: number;
  readonly onTheClock: string | null;
  readonly pickHistory: readonly Readonly<Pick>[];
};

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Fixed-capacity ring of snapshots, oldest first. Indexes follow the usual
 * negative-index convention: `-1` is the newest entry, `0` the oldest, and
 * anything outside `[-size, size - 1]` resolves to nothing.
 */
export class SnapshotRing<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("capacity must be a positive integer");
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T) {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = item;
      this.count += 1;
      return;
    }
    // Full: overwrite the oldest and advance.
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  resolveIndex(index: number): number | null {
    if (!Number.isInteger(index)) return null;
    if (index >= this.count || index < -this.count) return null;
    return index < 0 ? this.count + index : index;
  }

  at(index: number): T | null {
    const position = this.resolveIndex(index);
    if (position === null) return null;
    return this.slots[(this.start + position) % this.capacity] ?? null;
  }

  /** Drops every entry newer than `position` (an already-resolved index). */
  truncateAfter(position: number) {
    const keep = Math.min(Math.max(position + 1, 0), this.count);
    for (let i = keep; i < this.count; i += 1) {
      this.slots[(this.start + i) % this.capacity] = undefined;
    }
    this.count = keep;
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }
}
