import {
  ProtocolParseError,
  parseFrame,
  type AutodraftEvent,
  type ClockEvent,
  type DraftEvent,
  type DraftEventType,
  type SelectedEvent,
  type SelectingEvent
} from "@draftwire/shared";
import { BENCH, StateMutationError, type DraftStateStore } from "../domain/draftStore.js";
import type { Pick } from "../domain/snapshots.js";
import { ListenerRegistry } from "../lib/listeners.js";
import { errorMessage, log } from "../logger.js";

export type PositionResolver = (playerId: string) => string;

export type ProcessorEvents = {
  pick: { pick: Pick; event: SelectedEvent };
  selecting: { pickNumber: number; teamId: string; timeLimitSeconds: number };
  clock: { teamId: string; timeRemainingSeconds: number; round: number | null };
  autodraft: { teamId: string; enabled: boolean };
  rejected: { event: DraftEvent; error: StateMutationError };
  parseError: { raw: string; error: ProtocolParseError };
};

export type ProcessOutcome =
  | { kind: "applied"; event: DraftEvent }
  | { kind: "rejected"; event: DraftEvent; error: StateMutationError }
  | { kind: "parse_error"; error: ProtocolParseError };

function emptyCounts(): Record<DraftEventType, number> {
  return {
    SELECTED: 0,
    SELECTING: 0,
    CLOCK: 0,
    AUTODRAFT: 0,
    TOKEN: 0,
    JOINED: 0,
    LEFT: 0,
    PING: 0,
    PONG: 0,
    UNKNOWN: 0
  };
}

export class DraftEventProcessor {
  private readonly listeners = new ListenerRegistry<ProcessorEvents>("event_processor");
  private resolver: PositionResolver | null = null;

  private totalMessages = 0;
  private parseErrors = 0;
  private stateUpdateErrors = 0;
  private messageCounts = emptyCounts();

  constructor(private readonly store: DraftStateStore) {}

  on<K extends keyof ProcessorEvents>(
    event: K,
    listener: (payload: ProcessorEvents[K]) => void
  ) {
    return this.listeners.on(event, listener);
  }

  setPositionResolver(resolver: PositionResolver | null) {
    this.resolver = resolver;
  }

  /** Parses and applies one raw frame. Never throws for bad frames or rejected picks. */
  processFrame(raw: string): ProcessOutcome {
    let event: DraftEvent;
    try {
      event = parseFrame(raw);
    } catch (err) {
      if (!(err instanceof ProtocolParseError)) throw err;
      this.totalMessages += 1;
      this.parseErrors += 1;
      log({
        level: "warn",
        msg: "frame_parse_failed",
        code: err.code,
        error: err.message,
        raw
      });
      this.listeners.emit("parseError", { raw, error: err });
      return { kind: "parse_error", error: err };
    }
    return this.processEvent(event);
  }

  processEvent(event: DraftEvent): ProcessOutcome {
    this.totalMessages += 1;
    this.messageCounts[event.type] += 1;

    try {
      switch (event.type) {
        case "SELECTED":
          return this.handleSelected(event);
        case "SELECTING":
          return this.handleSelecting(event);
        case "CLOCK":
          return this.handleClock(event);
        case "AUTODRAFT":
          return this.handleAutodraft(event);
        case "PING":
        case "PONG":
          log({ level: "debug", msg: "session_keepalive", command: event.type });
          return { kind: "applied", event };
        case "TOKEN":
        case "JOINED":
        case "LEFT":
          log({ level: "info", msg: "session_message", command: event.type, args: event.args });
          return { kind: "applied", event };
        case "UNKNOWN":
          log({ level: "debug", msg: "frame_unrecognized", raw: event.raw });
          return { kind: "applied", event };
      }
    } catch (err) {
      if (err instanceof StateMutationError) return this.reject(event, err);
      log({
        level: "error",
        msg: "event_processing_failed",
        type: event.type,
        error: errorMessage(err)
      });
      throw err;
    }
  }

  getStats() {
    const total = this.totalMessages;
    const failures = this.parseErrors + this.stateUpdateErrors;
    return {
      total_messages: total,
      message_counts: { ...this.messageCounts },
      parse_errors: this.parseErrors,
      state_update_errors: this.stateUpdateErrors,
      success_rate: total === 0 ? 1 : (total - failures) / total,
      parse_error_rate: total === 0 ? 0 : this.parseErrors / total,
      state_error_rate: total === 0 ? 0 : this.stateUpdateErrors / total
    };
  }

  resetStats() {
    this.totalMessages = 0;
    this.parseErrors = 0;
    this.stateUpdateErrors = 0;
    this.messageCounts = emptyCounts();
  }

  clearListeners() {
    this.listeners.clear();
  }

  private resolvePosition(playerId: string): string {
    if (!this.resolver) return BENCH;
    try {
      return this.resolver(playerId) || BENCH;
    } catch (err) {
      log({
        level: "warn",
        msg: "position_resolver_failed",
        player_id: playerId,
        error: errorMessage(err)
      });
      return BENCH;
    }
  }

  private handleSelected(event: SelectedEvent): ProcessOutcome {
    const teamId = String(event.teamId);
    if (this.store.draftStatus === "COMPLETED") {
      throw new StateMutationError("Draft is already completed", "DRAFT_COMPLETED", {
        player_id: event.playerId,
        team_id: teamId,
        pick_number: event.pickSeq
      });
    }
    const position = this.resolvePosition(event.playerId);
    const applied = this.store.applyPick(event.playerId, teamId, event.pickSeq, position);
    if (!applied) {
      throw new StateMutationError(
        `Player ${event.playerId} is already drafted`,
        "DUPLICATE_PICK",
        { player_id: event.playerId, team_id: teamId, pick_number: event.pickSeq }
      );
    }
    const history = this.store.view().pickHistory;
    const pick = history[history.length - 1];
    if (pick) this.listeners.emit("pick", { pick: { ...pick }, event });
    return { kind: "applied", event };
  }

  private handleSelecting(event: SelectingEvent): ProcessOutcome {
    const teamId = String(event.teamId);
    const pickNumber = this.store.currentPick + 1;
    const timeLimitSeconds = event.timeLimitMs / 1000;
    if (!this.store.startNewPick(pickNumber, teamId, timeLimitSeconds)) {
      throw new StateMutationError("Draft is already completed", "DRAFT_COMPLETED", {
        pick_number: pickNumber,
        team_id: teamId
      });
    }
    this.listeners.emit("selecting", { pickNumber, teamId, timeLimitSeconds });
    return { kind: "applied", event };
  }

  private handleClock(event: ClockEvent): ProcessOutcome {
    const timeRemainingSeconds = event.timeRemainingMs / 1000;
    this.store.updateClock(timeRemainingSeconds);
    this.listeners.emit("clock", {
      teamId: String(event.teamId),
      timeRemainingSeconds: this.store.timeRemaining,
      round: event.round
    });
    return { kind: "applied", event };
  }

  private handleAutodraft(event: AutodraftEvent): ProcessOutcome {
    const teamId = String(event.teamId);
    log({ level: "info", msg: "autodraft_changed", team_id: teamId, enabled: event.enabled });
    this.listeners.emit("autodraft", { teamId, enabled: event.enabled });
    return { kind: "applied", event };
  }

  private reject(event: DraftEvent, error: StateMutationError): ProcessOutcome {
    this.stateUpdateErrors += 1;
    log({
      level: "warn",
      msg: "event_rejected",
      type: event.type,
      code: error.code,
      error: error.message
    });
    this.listeners.emit("rejected", { event, error });
    return { kind: "rejected", event, error };
  }
}
