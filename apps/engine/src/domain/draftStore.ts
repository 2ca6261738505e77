import {
  computeSnakePickNumbers,
  enforceDraftTransition,
  picksUntilNext,
  type DraftStatus
} from "@draftwire/shared";
import { log } from "../logger.js";
import {
  SnapshotRing,
  deepFreeze,
  type DraftStateSnapshot,
  type Pick,
  type RosterView
} from "./snapshots.js";

export const BENCH = "BENCH";
export const DEFAULT_ROSTER_POSITIONS = ["QB", "RB", "WR", "TE", "K", "DST", "FLEX", BENCH];
export const DEFAULT_SNAPSHOT_CAPACITY = 100;

export type DraftSession = {
  leagueId: string;
  myTeamId: string;
  teamCount: number;
  rounds: number;
};

export type StateMutationErrorCode =
  | "DUPLICATE_PICK"
  | "POOL_ALREADY_INITIALIZED"
  | "INVALID_DRAFT_ORDER"
  | "DRAFT_COMPLETED";

export class StateMutationError extends Error {
  constructor(
    message: string,
    public code: StateMutationErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StateMutationError";
  }
}

type RosterBuckets = Record<string, string[]>;

function emptyRoster(): RosterBuckets {
  return Object.fromEntries(DEFAULT_ROSTER_POSITIONS.map((position) => [position, []]));
}

function cloneRoster(roster: RosterView): RosterBuckets {
  return Object.fromEntries(
    Object.entries(roster).map(([position, players]) => [position, [...players]])
  );
}

type Clock = () => Date;

const defaultClock: Clock = () => new Date();

/**
 * Owns all mutable draft state. Every mutation is synchronous and, apart from
 * clock ticks, records a snapshot of the prior state first so the store can
 * be rolled back.
 */
export class DraftStateStore {
  readonly session: DraftSession;

  private status: DraftStatus = "WAITING";
  private drafted = new Set<string>();
  private available: string[] = [];
  private myRosterBuckets: RosterBuckets = emptyRoster();
  private otherRosterBuckets = new Map<string, RosterBuckets>();
  private currentPickNumber = 0;
  private missedPickCount = 0;
  private picksUntilNextTurn = 0;
  private timeRemainingSeconds = 0;
  private onClock: string | null = null;
  private history: Pick[] = [];

  private order: string[] = [];
  private myPickNumbers: number[] = [];
  private poolInitialized = false;

  private readonly snapshots: SnapshotRing<DraftStateSnapshot>;
  private readonly now: Clock;
  private published: DraftStateSnapshot | null = null;

  constructor(
    session: DraftSession,
    opts: { snapshotCapacity?: number; now?: Clock } = {}
  ) {
    this.session = { ...session };
    this.snapshots = new SnapshotRing(opts.snapshotCapacity ?? DEFAULT_SNAPSHOT_CAPACITY);
    this.now = opts.now ?? defaultClock;
    log({
      level: "info",
      msg: "draft_store_initialized",
      league_id: session.leagueId,
      team_id: session.myTeamId,
      team_count: session.teamCount,
      rounds: session.rounds
    });
  }

  get draftStatus(): DraftStatus {
    return this.status;
  }

  get currentPick(): number {
    return this.currentPickNumber;
  }

  get picksUntilNext(): number {
    return this.picksUntilNextTurn;
  }

  get timeRemaining(): number {
    return this.timeRemainingSeconds;
  }

  get onTheClock(): string | null {
    return this.onClock;
  }

  get completedPicks(): number {
    return this.history.length;
  }

  get missedPicks(): number {
    return this.missedPickCount;
  }

  /** Overall number of the newest recorded pick, 0 before the first one. */
  get lastPickNumber(): number {
    return this.history[this.history.length - 1]?.pickNumber ?? 0;
  }

  get snapshotCount(): number {
    return this.snapshots.size;
  }

  get draftOrder(): readonly string[] {
    return [...this.order];
  }

  get myPicks(): readonly number[] {
    return [...this.myPickNumbers];
  }

  isDrafted(playerId: string): boolean {
    return this.drafted.has(playerId);
  }

  /**
   * Current state as an immutable value. The reference only changes after a
   * mutation, so readers holding it never observe a half-applied update.
   */
  view(): DraftStateSnapshot {
    if (!this.published) this.published = this.capture();
    return this.published;
  }

  initializePlayerPool(playerIds: readonly string[]) {
    if (this.poolInitialized) {
      throw new StateMutationError(
        "Player pool is already initialized",
        "POOL_ALREADY_INITIALIZED"
      );
    }
    this.available = [...new Set(playerIds)].filter((id) => !this.drafted.has(id));
    this.poolInitialized = true;
    this.touch();
    log({ level: "info", msg: "player_pool_initialized", players: this.available.length });
  }

  setDraftOrder(teamIds: readonly string[]) {
    if (teamIds.length !== this.session.teamCount || new Set(teamIds).size !== teamIds.length) {
      throw new StateMutationError(
        `Draft order must list ${this.session.teamCount} distinct teams`,
        "INVALID_DRAFT_ORDER",
        { team_ids: [...teamIds] }
      );
    }
    this.order = [...teamIds];
    const myIndex = this.order.indexOf(this.session.myTeamId);
    this.myPickNumbers =
      myIndex === -1
        ? []
        : computeSnakePickNumbers(this.session.teamCount, this.session.rounds, myIndex);
    this.recomputePicksUntilNext();
    this.touch();
    log({
      level: "info",
      msg: "draft_order_set",
      draft_order: this.order,
      my_picks: this.myPickNumbers
    });
  }

  applyPick(playerId: string, teamId: string, pickNumber: number, position = BENCH): boolean {
    if (this.status === "COMPLETED") {
      log({
        level: "warn",
        msg: "pick_rejected_draft_completed",
        player_id: playerId,
        team_id: teamId,
        pick_number: pickNumber
      });
      return false;
    }
    if (this.drafted.has(playerId)) {
      log({
        level: "warn",
        msg: "pick_rejected_already_drafted",
        player_id: playerId,
        team_id: teamId,
        pick_number: pickNumber
      });
      return false;
    }
    const poolIndex = this.available.indexOf(playerId);
    if (poolIndex === -1) {
      log({ level: "warn", msg: "pick_outside_pool", player_id: playerId });
    }

    this.takeSnapshot();

    this.drafted.add(playerId);
    if (poolIndex !== -1) this.available.splice(poolIndex, 1);
    this.appendToRoster(teamId, position, playerId);
    this.history.push({
      pickNumber,
      playerId,
      teamId,
      rosterPosition: position,
      timestamp: this.now().toISOString()
    });
    this.currentPickNumber = pickNumber;
    this.recomputePicksUntilNext();
    this.touch();

    log({
      level: "info",
      msg: "pick_applied",
      pick_number: pickNumber,
      player_id: playerId,
      team_id: teamId,
      position
    });
    return true;
  }

  startNewPick(pickNumber: number, teamId: string, timeLimitSeconds: number): boolean {
    if (this.status === "COMPLETED") {
      log({ level: "warn", msg: "pick_start_after_completion", pick_number: pickNumber });
      return false;
    }
    this.takeSnapshot();

    this.currentPickNumber = pickNumber;
    this.onClock = teamId;
    this.timeRemainingSeconds = Math.max(0, timeLimitSeconds);
    this.recomputePicksUntilNext();
    if (this.status !== "IN_PROGRESS") {
      this.status = enforceDraftTransition(this.status, "IN_PROGRESS");
    }
    this.touch();

    log({
      level: "info",
      msg: "pick_started",
      pick_number: pickNumber,
      team_id: teamId,
      time_limit_s: timeLimitSeconds
    });
    return true;
  }

  updateClock(secondsRemaining: number) {
    this.timeRemainingSeconds = Number.isFinite(secondsRemaining)
      ? Math.max(0, secondsRemaining)
      : 0;
    this.touch();
  }

  /**
   * Accounts for picks made while the feed was down. They never arrive as
   * frames, so the current pick moves past them without a history entry.
   */
  recordMissedPicks(count: number): boolean {
    if (!Number.isInteger(count) || count <= 0) return false;
    this.takeSnapshot();
    this.missedPickCount += count;
    const accounted = this.history.length + this.missedPickCount;
    if (this.currentPickNumber < accounted) this.currentPickNumber = accounted;
    this.recomputePicksUntilNext();
    this.touch();
    log({
      level: "warn",
      msg: "missed_picks_recorded",
      missed_picks: count,
      total_missed: this.missedPickCount,
      current_pick: this.currentPickNumber
    });
    return true;
  }

  completeDraft(): boolean {
    if (this.status === "COMPLETED") return false;
    this.takeSnapshot();
    this.status = enforceDraftTransition(this.status, "COMPLETED");
    this.onClock = null;
    this.timeRemainingSeconds = 0;
    this.touch();
    log({ level: "info", msg: "draft_completed", total_picks: this.history.length });
    return true;
  }

  /** Moves an already-rostered player into another position bucket. */
  patchRosterPosition(playerId: string, position: string): boolean {
    const located = this.locatePlayer(playerId);
    if (!located || located.position === position) return false;

    this.takeSnapshot();
    const roster = this.rosterBuckets(located.teamId);
    const bucket = roster[located.position] ?? [];
    roster[located.position] = bucket.filter((id) => id !== playerId);
    (roster[position] ??= []).push(playerId);
    this.touch();

    log({
      level: "info",
      msg: "roster_position_patched",
      player_id: playerId,
      team_id: located.teamId,
      from: located.position,
      to: position
    });
    return true;
  }

  locatePlayer(playerId: string): { teamId: string; position: string } | null {
    const teams: Array<[string, RosterBuckets]> = [
      [this.session.myTeamId, this.myRosterBuckets],
      ...this.otherRosterBuckets.entries()
    ];
    for (const [teamId, roster] of teams) {
      for (const [position, players] of Object.entries(roster)) {
        if (players.includes(playerId)) return { teamId, position };
      }
    }
    return null;
  }

  getSnapshot(index = -1): DraftStateSnapshot | null {
    return this.snapshots.at(index);
  }

  listSnapshots(): DraftStateSnapshot[] {
    return this.snapshots.toArray();
  }

  rollbackToSnapshot(index: number): boolean {
    const position = this.snapshots.resolveIndex(index);
    const snapshot = this.snapshots.at(index);
    if (position === null || !snapshot) {
      log({
        level: "warn",
        msg: "rollback_index_out_of_range",
        index,
        snapshots: this.snapshots.size
      });
      return false;
    }

    this.restore(snapshot);
    this.snapshots.truncateAfter(position);
    this.touch();
    log({
      level: "info",
      msg: "rolled_back",
      index,
      restored_pick: snapshot.currentPick,
      snapshots: this.snapshots.size
    });
    return true;
  }

  getStats() {
    return {
      league_id: this.session.leagueId,
      team_id: this.session.myTeamId,
      draft_status: this.status,
      current_pick: this.currentPickNumber,
      total_picks: this.history.length,
      missed_picks: this.missedPickCount,
      my_picks: this.history.filter((pick) => pick.teamId === this.session.myTeamId).length,
      picks_until_next: this.picksUntilNextTurn,
      available_players: this.available.length,
      time_remaining: this.timeRemainingSeconds,
      on_the_clock: this.onClock,
      snapshots_count: this.snapshots.size,
      my_roster_counts: Object.fromEntries(
        Object.entries(this.myRosterBuckets).map(([position, players]) => [
          position,
          players.length
        ])
      )
    };
  }

  private rosterBuckets(teamId: string): RosterBuckets {
    if (teamId === this.session.myTeamId) return this.myRosterBuckets;
    let roster = this.otherRosterBuckets.get(teamId);
    if (!roster) {
      roster = emptyRoster();
      this.otherRosterBuckets.set(teamId, roster);
    }
    return roster;
  }

  private appendToRoster(teamId: string, position: string, playerId: string) {
    const roster = this.rosterBuckets(teamId);
    (roster[position] ??= []).push(playerId);
  }

  private recomputePicksUntilNext() {
    this.picksUntilNextTurn = picksUntilNext(this.myPickNumbers, this.currentPickNumber);
  }

  private capture(): DraftStateSnapshot {
    return deepFreeze({
      takenAt: this.now().toISOString(),
      status: this.status,
      draftedPlayers: [...this.drafted],
      availablePlayers: [...this.available],
      myRoster: cloneRoster(this.myRosterBuckets),
      otherRosters: Object.fromEntries(
        [...this.otherRosterBuckets.entries()].map(([teamId, roster]) => [
          teamId,
          cloneRoster(roster)
        ])
      ),
      currentPick: this.currentPickNumber,
      missedPicks: this.missedPickCount,
      picksUntilNext: this.picksUntilNextTurn,
      timeRemaining: this.timeRemainingSeconds,
      onTheClock: this.onClock,
      pickHistory: this.history.map((pick) => ({ ...pick }))
    });
  }

  private takeSnapshot() {
    this.snapshots.push(this.capture());
  }

  private restore(snapshot: DraftStateSnapshot) {
    this.status = snapshot.status;
    this.drafted = new Set(snapshot.draftedPlayers);
    this.available = [...snapshot.availablePlayers];
    this.myRosterBuckets = cloneRoster(snapshot.myRoster);
    this.otherRosterBuckets = new Map(
      Object.entries(snapshot.otherRosters).map(([teamId, roster]) => [
        teamId,
        cloneRoster(roster)
      ])
    );
    this.currentPickNumber = snapshot.currentPick;
    this.missedPickCount = snapshot.missedPicks;
    this.picksUntilNextTurn = snapshot.picksUntilNext;
    this.timeRemainingSeconds = snapshot.timeRemaining;
    this.onClock = snapshot.onTheClock;
    this.history = snapshot.pickHistory.map((pick) => ({ ...pick }));
  }

  private touch() {
    this.published = null;
  }
}
