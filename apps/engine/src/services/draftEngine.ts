import { pickNumberOf } from "@draftwire/shared";
import {
  ConsistencyValidator,
  ConsistencyViolation,
  type ValidationResult
} from "../domain/consistency.js";
import { DraftStateStore, type DraftSession } from "../domain/draftStore.js";
import type { Pick, RosterView } from "../domain/snapshots.js";
import { ListenerRegistry } from "../lib/listeners.js";
import { log } from "../logger.js";
import {
  ConnectionManager,
  type ConnectionEvents,
  type ConnectionManagerOptions
} from "../realtime/connectionManager.js";
import type { FrameTransport } from "../realtime/frameTransport.js";
import { DraftEventProcessor, type ProcessOutcome } from "./eventProcessor.js";
import type { PlayerDirectory, PlayerIdentity } from "./playerDirectory.js";
import { PlayerResolutionQueue } from "./playerResolution.js";

export type PickView = Pick & { playerName: string };

export type EngineEvents = {
  pick: { pick: PickView; player: PlayerIdentity };
  "pick.updated": { pick: PickView; player: PlayerIdentity };
  gap: ConnectionEvents["gap"];
  completed: { totalPicks: number; validation: ValidationResult };
  connection: ConnectionEvents["state"];
  "connection.failed": { code: string; message: string; target: string | null };
  recovered: { restoredIndex: number | null; errors: string[] };
  violation: { message: string; errors: string[] };
};

export type DraftEngineOptions = {
  session: DraftSession;
  directory: PlayerDirectory;
  transport?: FrameTransport | null;
  snapshotCapacity?: number;
  validateEveryPicks?: number;
  resolutionIntervalMs?: number;
  connection?: Omit<ConnectionManagerOptions, "lastPick" | "pickOf">;
  now?: () => Date;
};

/**
 * Composes the draft pipeline: frames from the connection feed the processor,
 * the processor mutates the store, and the validator checks the result every
 * few applied picks. Also the read side for the HTTP and socket surfaces.
 */
export class DraftEngine {
  readonly store: DraftStateStore;
  readonly processor: DraftEventProcessor;
  readonly validator: ConsistencyValidator;
  readonly resolution: PlayerResolutionQueue;
  readonly connection: ConnectionManager | null;

  private readonly listeners = new ListenerRegistry<EngineEvents>("draft_engine");
  private readonly validateEveryPicks: number;
  private picksSinceValidation = 0;
  private halted = false;

  constructor(opts: DraftEngineOptions) {
    this.store = new DraftStateStore(opts.session, {
      snapshotCapacity: opts.snapshotCapacity,
      now: opts.now
    });
    this.processor = new DraftEventProcessor(this.store);
    this.validator = new ConsistencyValidator(this.store);
    this.resolution = new PlayerResolutionQueue(opts.directory, {
      intervalMs: opts.resolutionIntervalMs
    });
    this.validateEveryPicks = Math.max(1, opts.validateEveryPicks ?? 1);

    this.processor.setPositionResolver((playerId) => this.resolution.resolvePosition(playerId));
    this.processor.on("pick", ({ pick }) => {
      const player = this.resolution.identityOf(pick.playerId);
      this.listeners.emit("pick", { pick: { ...pick, playerName: player.name }, player });
    });
    this.resolution.on("resolved", ({ identity }) => this.applyResolvedIdentity(identity));

    this.connection = opts.transport
      ? new ConnectionManager(opts.transport, {
          ...opts.connection,
          lastPick: () => this.store.lastPickNumber,
          pickOf: pickNumberOf
        })
      : null;
    if (this.connection) {
      this.connection.on("frame", ({ frame }) => {
        this.ingestFrame(frame);
      });
      this.connection.on("state", (change) => this.listeners.emit("connection", change));
      // Gaps are reported before the frame that revealed them is ingested.
      this.connection.on("gap", (gap) => {
        this.store.recordMissedPicks(gap.missedPicks);
        this.listeners.emit("gap", gap);
      });
      this.connection.on("failed", ({ error }) => {
        this.listeners.emit("connection.failed", {
          code: error.code,
          message: error.message,
          target: this.connection?.target ?? null
        });
      });
    }
  }

  on<K extends keyof EngineEvents>(event: K, listener: (payload: EngineEvents[K]) => void) {
    return this.listeners.on(event, listener);
  }

  get isHalted(): boolean {
    return this.halted;
  }

  initializePlayerPool(players: readonly (string | PlayerIdentity)[]) {
    const identities = players.filter(
      (player): player is PlayerIdentity => typeof player !== "string"
    );
    this.resolution.seed(identities);
    this.store.initializePlayerPool(
      players.map((player) => (typeof player === "string" ? player : player.playerId))
    );
  }

  setDraftOrder(teamIds: readonly string[]) {
    this.store.setDraftOrder(teamIds);
  }

  /** Feeds one received frame through the pipeline. Returns null once ingestion has halted. */
  ingestFrame(raw: string): ProcessOutcome | null {
    if (this.halted) {
      log({ level: "warn", msg: "frame_dropped_engine_halted" });
      return null;
    }
    const outcome = this.processor.processFrame(raw);
    if (outcome.kind !== "applied" || outcome.event.type !== "SELECTED") return outcome;

    this.picksSinceValidation += 1;
    if (this.picksSinceValidation >= this.validateEveryPicks) {
      this.picksSinceValidation = 0;
      if (!this.runValidation()) return outcome;
    }
    this.completeIfFinished();
    return outcome;
  }

  async start(target?: string | null): Promise<boolean> {
    this.resolution.start();
    if (!this.connection || !target) {
      log({ level: "info", msg: "engine_started_idle", realtime: Boolean(this.connection) });
      return false;
    }
    return this.connection.connect(target);
  }

  async shutdown() {
    this.resolution.stop();
    if (this.connection) await this.connection.shutdown();
    this.listeners.clear();
    log({ level: "info", msg: "engine_shutdown", total_picks: this.store.completedPicks });
  }

  validate(): ValidationResult {
    return this.validator.validate();
  }

  getState() {
    const state = this.store.view();
    return {
      league_id: this.store.session.leagueId,
      team_id: this.store.session.myTeamId,
      team_count: this.store.session.teamCount,
      rounds: this.store.session.rounds,
      status: state.status,
      current_pick: state.currentPick,
      on_the_clock: state.onTheClock,
      time_remaining: state.timeRemaining,
      picks_until_next: state.picksUntilNext,
      total_picks: state.pickHistory.length,
      missed_picks: state.missedPicks,
      my_picks: [...this.store.myPicks],
      draft_order: [...this.store.draftOrder],
      connection_state: this.connection?.connectionState ?? null,
      halted: this.halted,
      updated_at: state.takenAt
    };
  }

  getMyRoster(): Record<string, PlayerIdentity[]> {
    return this.describeRoster(this.store.view().myRoster);
  }

  getOtherRosters(): Record<string, Record<string, PlayerIdentity[]>> {
    return Object.fromEntries(
      Object.entries(this.store.view().otherRosters).map(([teamId, roster]) => [
        teamId,
        this.describeRoster(roster)
      ])
    );
  }

  getAvailablePlayers(position?: string): PlayerIdentity[] {
    const players = this.store
      .view()
      .availablePlayers.map((id) => this.resolution.identityOf(id));
    if (!position) return players;
    return players.filter((player) => this.resolution.knownPosition(player.playerId) === position);
  }

  getPicks(): PickView[] {
    return this.store.view().pickHistory.map((pick) => this.describePick(pick));
  }

  getStats() {
    return {
      processor: this.processor.getStats(),
      store: this.store.getStats(),
      validator: this.validator.getStats(),
      resolution: this.resolution.getStats(),
      connection: this.connection?.getStats() ?? null
    };
  }

  private describePick(pick: Pick): PickView {
    return { ...pick, playerName: this.resolution.identityOf(pick.playerId).name };
  }

  private describeRoster(roster: RosterView): Record<string, PlayerIdentity[]> {
    return Object.fromEntries(
      Object.entries(roster).map(([position, ids]) => [
        position,
        ids.map((id) => ({ ...this.resolution.identityOf(id), position }))
      ])
    );
  }

  private runValidation(): boolean {
    try {
      const outcome = this.validator.validateAndHeal();
      if (outcome.recovered) {
        this.listeners.emit("recovered", {
          restoredIndex: outcome.restoredIndex,
          errors: outcome.validation.errors
        });
      }
      return true;
    } catch (err) {
      if (!(err instanceof ConsistencyViolation)) throw err;
      this.halted = true;
      log({ level: "error", msg: "engine_halted", error: err.message, errors: err.errors });
      this.listeners.emit("violation", { message: err.message, errors: err.errors });
      return false;
    }
  }

  private completeIfFinished() {
    const { teamCount, rounds } = this.store.session;
    const total = teamCount * rounds;
    const accounted = this.store.completedPicks + this.store.missedPicks;
    if (accounted < total || this.store.draftStatus === "COMPLETED") return;
    this.store.completeDraft();
    const validation = this.validator.validateCompletion();
    this.listeners.emit("completed", { totalPicks: this.store.completedPicks, validation });
  }

  private applyResolvedIdentity(identity: PlayerIdentity) {
    const pick = this.store
      .view()
      .pickHistory.find((entry) => entry.playerId === identity.playerId);
    if (!pick) return;
    const located = this.store.locatePlayer(identity.playerId);
    if (located && located.position !== identity.position) {
      this.store.patchRosterPosition(identity.playerId, identity.position);
    }
    this.listeners.emit("pick.updated", { pick: this.describePick(pick), player: identity });
  }
}
