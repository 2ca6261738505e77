import { BENCH } from "../domain/draftStore.js";
import { ListenerRegistry } from "../lib/listeners.js";
import { errorMessage, log } from "../logger.js";
import type { PlayerDirectory, PlayerIdentity } from "./playerDirectory.js";

export class ResolutionError extends Error {
  constructor(
    message: string,
    public playerIds: string[]
  ) {
    super(message);
    this.name = "ResolutionError";
  }
}

export type ResolutionEvents = {
  resolved: { identity: PlayerIdentity };
};

const MAX_ATTEMPTS = 3;

export function placeholderIdentity(playerId: string): PlayerIdentity {
  return { playerId, name: `Player #${playerId}`, position: BENCH };
}

/**
 * Resolves player ids to identities off the processing path. Lookups that miss
 * the cache return a placeholder immediately and are batched to the directory
 * by `flush()`, either on demand or from the `start()` loop.
 */
export class PlayerResolutionQueue {
  private readonly listeners = new ListenerRegistry<ResolutionEvents>("player_resolution");
  private readonly cache = new Map<string, PlayerIdentity>();
  private readonly unknown = new Set<string>();
  private readonly pending = new Set<string>();
  private readonly attempts = new Map<string, number>();
  private inFlight: Promise<PlayerIdentity[]> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stats = { resolved: 0, unresolved: 0, failures: 0, batches: 0 };

  private readonly intervalMs: number;
  private readonly batchSize: number;

  constructor(
    private readonly directory: PlayerDirectory,
    opts: { intervalMs?: number; batchSize?: number } = {}
  ) {
    this.intervalMs = opts.intervalMs ?? 1000;
    this.batchSize = opts.batchSize ?? 50;
  }

  on<K extends keyof ResolutionEvents>(
    event: K,
    listener: (payload: ResolutionEvents[K]) => void
  ) {
    return this.listeners.on(event, listener);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  seed(identities: readonly PlayerIdentity[]) {
    for (const identity of identities) {
      this.cache.set(identity.playerId, { ...identity });
      this.pending.delete(identity.playerId);
    }
  }

  knownPosition(playerId: string): string | null {
    return this.cache.get(playerId)?.position ?? null;
  }

  identityOf(playerId: string): PlayerIdentity {
    return this.cache.get(playerId) ?? placeholderIdentity(playerId);
  }

  /** Synchronous position lookup for the event processor; never waits on the directory. */
  resolvePosition(playerId: string): string {
    const known = this.knownPosition(playerId);
    if (known) return known;
    this.enqueue(playerId);
    return BENCH;
  }

  enqueue(playerId: string) {
    if (this.cache.has(playerId) || this.unknown.has(playerId)) return;
    this.pending.add(playerId);
  }

  /** Resolves the next batch. Concurrent callers share the batch already running. */
  flush(): Promise<PlayerIdentity[]> {
    if (this.inFlight) return this.inFlight;
    if (this.pending.size === 0) return Promise.resolve([]);
    this.inFlight = this.resolveBatch().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        log({ level: "error", msg: "player_resolution_loop_failed", error: errorMessage(err) });
      });
    }, this.intervalMs);
  }

  /** Stops the loop and discards whatever is still queued. */
  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.pending.clear();
    this.attempts.clear();
  }

  getStats() {
    return {
      ...this.stats,
      pending: this.pending.size,
      cached: this.cache.size
    };
  }

  private async resolveBatch(): Promise<PlayerIdentity[]> {
    const batch = [...this.pending].slice(0, this.batchSize);
    for (const id of batch) this.pending.delete(id);
    this.stats.batches += 1;

    let results: Map<string, PlayerIdentity | null>;
    try {
      results = await this.directory.resolveMany(batch);
    } catch (err) {
      this.stats.failures += 1;
      const retry = batch.filter((id) => (this.attempts.get(id) ?? 0) + 1 < MAX_ATTEMPTS);
      for (const id of batch) this.attempts.set(id, (this.attempts.get(id) ?? 0) + 1);
      for (const id of retry) this.pending.add(id);
      for (const id of batch) {
        if (!retry.includes(id)) this.markUnknown(id);
      }
      const failure = new ResolutionError(errorMessage(err), batch);
      log({
        level: "warn",
        msg: "player_resolution_failed",
        error: failure.message,
        player_ids: failure.playerIds,
        retrying: retry.length
      });
      return [];
    }

    const resolved: PlayerIdentity[] = [];
    for (const id of batch) {
      this.attempts.delete(id);
      const identity = results.get(id) ?? null;
      if (!identity) {
        this.markUnknown(id);
        continue;
      }
      const normalized = { ...identity, position: identity.position.toUpperCase() || BENCH };
      this.cache.set(id, normalized);
      this.stats.resolved += 1;
      resolved.push(normalized);
      this.listeners.emit("resolved", { identity: normalized });
    }
    log({
      level: "debug",
      msg: "player_resolution_batch",
      requested: batch.length,
      resolved: resolved.length
    });
    return resolved;
  }

  private markUnknown(playerId: string) {
    this.attempts.delete(playerId);
    this.unknown.add(playerId);
    this.stats.unresolved += 1;
    log({ level: "info", msg: "player_unresolved", player_id: playerId });
  }
}
