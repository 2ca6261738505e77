import { getSnakeSeatForPick } from "@draftwire/shared";
import { log } from "../logger.js";
import type { DraftStateStore } from "./draftStore.js";
import type { DraftStateSnapshot } from "./snapshots.js";

export type ValidationResult = {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  suggestions: string[];
};

export type HealOutcome = {
  validation: ValidationResult;
  recovered: boolean;
  restoredIndex: number | null;
};

export class ConsistencyViolation extends Error {
  constructor(
    message: string,
    public errors: string[]
  ) {
    super(message);
    this.name = "ConsistencyViolation";
  }
}

const LARGE_POOL = 1000;
const LONG_HISTORY = 200;

function formatIds(ids: Iterable<string>): string {
  return [...ids].sort().join(", ");
}

function rosterSize(roster: DraftStateSnapshot["myRoster"]): number {
  return Object.values(roster).reduce((sum, players) => sum + players.length, 0);
}

/**
 * Checks a state value against the draft invariants. Pure: works on the
 * store's current view or on any retained snapshot.
 */
export function checkState(state: DraftStateSnapshot, myTeamId: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const suggestions: string[] = [];

  const drafted = new Set(state.draftedPlayers);
  const completed = state.pickHistory.length;

  if (drafted.size !== completed) {
    errors.push(`Drafted players count (${drafted.size}) != pick history (${completed})`);
  }

  // A team on the clock puts currentPick one ahead of the completed count.
  // Picks missed during an outage count as completed.
  const accounted = completed + state.missedPicks;
  if (accounted > 0 || state.currentPick > 0) {
    if (state.currentPick < accounted) {
      errors.push(`Current pick (${state.currentPick}) is behind completed picks (${accounted})`);
    } else if (state.currentPick > accounted + 1) {
      errors.push(
        `Current pick (${state.currentPick}) is too far ahead of completed picks (${accounted})`
      );
    }
  }

  const overlap = state.availablePlayers.filter((id) => drafted.has(id));
  if (overlap.length > 0) {
    errors.push(`Players in both drafted and available: ${formatIds(overlap)}`);
  }

  const rosters: Array<[string, DraftStateSnapshot["myRoster"]]> = [
    [myTeamId, state.myRoster],
    ...Object.entries(state.otherRosters)
  ];

  const picksByTeam = new Map<string, number>();
  for (const pick of state.pickHistory) {
    picksByTeam.set(pick.teamId, (picksByTeam.get(pick.teamId) ?? 0) + 1);
  }
  const teamsSeen = new Set<string>();
  for (const [teamId, roster] of rosters) {
    teamsSeen.add(teamId);
    const size = rosterSize(roster);
    const expected = picksByTeam.get(teamId) ?? 0;
    if (size !== expected) {
      errors.push(`Team ${teamId} roster count mismatch: ${size} vs ${expected} picks`);
    }
  }
  for (const [teamId, count] of picksByTeam) {
    if (!teamsSeen.has(teamId)) {
      errors.push(`Team ${teamId} roster count mismatch: 0 vs ${count} picks`);
    }
  }

  const rostered = new Set<string>();
  const duplicates = new Set<string>();
  for (const [, roster] of rosters) {
    for (const players of Object.values(roster)) {
      for (const playerId of players) {
        if (rostered.has(playerId)) duplicates.add(playerId);
        rostered.add(playerId);
      }
    }
  }
  if (duplicates.size > 0) {
    errors.push(`Duplicate players found in multiple rosters: ${formatIds(duplicates)}`);
  }

  const draftedNotRostered = [...drafted].filter((id) => !rostered.has(id));
  if (draftedNotRostered.length > 0) {
    warnings.push(`Players drafted but not in rosters: ${formatIds(draftedNotRostered)}`);
  }
  const rosteredNotDrafted = [...rostered].filter((id) => !drafted.has(id));
  if (rosteredNotDrafted.length > 0) {
    errors.push(`Players in rosters but not drafted: ${formatIds(rosteredNotDrafted)}`);
  }

  if (state.availablePlayers.length > LARGE_POOL) {
    suggestions.push("Consider pruning available player pool for performance");
  }
  if (completed > LONG_HISTORY) {
    suggestions.push("Draft approaching completion, consider state cleanup");
  }

  return { isValid: errors.length === 0, errors, warnings, suggestions };
}

export class ConsistencyValidator {
  private stats = {
    validation_checks: 0,
    validation_failures: 0,
    state_recoveries: 0
  };

  constructor(private readonly store: DraftStateStore) {}

  validate(): ValidationResult {
    this.stats.validation_checks += 1;
    const result = checkState(this.store.view(), this.store.session.myTeamId);
    if (!result.isValid) {
      this.stats.validation_failures += 1;
      log({ level: "warn", msg: "state_validation_failed", errors: result.errors });
    }
    return result;
  }

  /**
   * Validates and, on a hard error, rolls back to the newest snapshot that is
   * itself valid. Throws ConsistencyViolation when no snapshot qualifies.
   */
  validateAndHeal(): HealOutcome {
    const validation = this.validate();
    if (validation.isValid) {
      return { validation, recovered: false, restoredIndex: null };
    }

    const myTeamId = this.store.session.myTeamId;
    const snapshots = this.store.listSnapshots();
    for (let index = snapshots.length - 1; index >= 0; index -= 1) {
      if (!checkState(snapshots[index], myTeamId).isValid) continue;
      if (!this.store.rollbackToSnapshot(index)) break;
      this.stats.state_recoveries += 1;
      log({
        level: "warn",
        msg: "state_recovered",
        restored_index: index,
        errors: validation.errors
      });
      return {
        validation: {
          ...validation,
          suggestions: [...validation.suggestions, "State automatically recovered from corruption"]
        },
        recovered: true,
        restoredIndex: index
      };
    }

    log({ level: "error", msg: "state_unrecoverable", errors: validation.errors });
    throw new ConsistencyViolation(
      "Draft state is inconsistent and no valid snapshot is available",
      validation.errors
    );
  }

  validatePickEligibility(playerId: string, teamId: string, pickNumber: number): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const state = this.store.view();

    if (state.draftedPlayers.includes(playerId)) {
      errors.push(`Player ${playerId} already drafted`);
    }
    if (!state.availablePlayers.includes(playerId)) {
      warnings.push(
        `Player ${playerId} not in available pool (may be valid if pool not initialized)`
      );
    }

    const completed = state.pickHistory.length + state.missedPicks;
    const expectedPick = completed + 1;
    if (pickNumber < expectedPick) {
      errors.push(`Pick number ${pickNumber} is in the past (completed: ${completed})`);
    } else if (pickNumber > expectedPick) {
      warnings.push(`Pick number ${pickNumber} skips ahead (expected: ${expectedPick})`);
    }

    if (state.onTheClock && state.onTheClock !== teamId) {
      warnings.push(`Team ${teamId} picking but ${state.onTheClock} is on clock`);
    }
    const expectedTeam = this.expectedTeamForPick(pickNumber);
    if (expectedTeam && expectedTeam !== teamId) {
      warnings.push(`Team order warning: expected ${expectedTeam}, got ${teamId}`);
    }

    return { isValid: errors.length === 0, errors, warnings, suggestions: [] };
  }

  expectedTeamForPick(pickNumber: number): string | null {
    const order = this.store.draftOrder;
    if (order.length === 0 || !Number.isInteger(pickNumber) || pickNumber <= 0) return null;
    return order[getSnakeSeatForPick(order.length, pickNumber) - 1] ?? null;
  }

  /** Full validation plus the end-of-draft pick count checks. */
  validateCompletion(): ValidationResult {
    const result = this.validate();
    const { teamCount, rounds } = this.store.session;
    const state = this.store.view();

    const expectedTotal = teamCount * rounds;
    if (state.pickHistory.length !== expectedTotal) {
      result.warnings.push(
        `Draft pick count mismatch: ${state.pickHistory.length} vs expected ${expectedTotal}`
      );
    }
    const rosters: Array<[string, DraftStateSnapshot["myRoster"]]> = [
      [this.store.session.myTeamId, state.myRoster],
      ...Object.entries(state.otherRosters)
    ];
    for (const [teamId, roster] of rosters) {
      const size = rosterSize(roster);
      if (size !== rounds) {
        result.warnings.push(`Team ${teamId} has ${size} picks (expected ${rounds})`);
      }
    }
    return result;
  }

  getStats() {
    const checks = this.stats.validation_checks;
    return {
      ...this.stats,
      validation_success_rate: checks === 0 ? 1 : (checks - this.stats.validation_failures) / checks
    };
  }
}
