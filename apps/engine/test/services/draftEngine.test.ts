import { describe, expect, it, vi } from "vitest";
import type { DraftSession } from "../../src/domain/draftStore.js";
import { DraftEngine, type EngineEvents } from "../../src/services/draftEngine.js";
import {
  StaticPlayerDirectory,
  type PlayerIdentity
} from "../../src/services/playerDirectory.js";
import { fixedClock } from "../support/time.js";
import { FakeTransport } from "../support/transport.js";

const TARGET = "http://draft.test";
const alpha: PlayerIdentity = { playerId: "P1", name: "Alpha Runner", position: "RB" };
const bravo: PlayerIdentity = { playerId: "P2", name: "Bravo Catcher", position: "WR" };
const charlie: PlayerIdentity = { playerId: "P3", name: "Charlie Passer", position: "QB" };

const tinyDraft: DraftSession = { leagueId: "L1", myTeamId: "1", teamCount: 2, rounds: 1 };
const fullDraft: DraftSession = { leagueId: "L1", myTeamId: "1", teamCount: 12, rounds: 16 };

function makeEngine(opts: {
  session?: DraftSession;
  transport?: FakeTransport;
  directory?: PlayerIdentity[];
  snapshotCapacity?: number;
  validateEveryPicks?: number;
  maxReconnectAttempts?: number;
}) {
  return new DraftEngine({
    session: opts.session ?? fullDraft,
    directory: new StaticPlayerDirectory(opts.directory ?? []),
    transport: opts.transport ?? null,
    snapshotCapacity: opts.snapshotCapacity,
    validateEveryPicks: opts.validateEveryPicks,
    connection: { sleep: async () => {}, maxReconnectAttempts: opts.maxReconnectAttempts },
    now: fixedClock()
  });
}

describe("DraftEngine", () => {
  it("runs a draft from transport frames to completion", async () => {
    const transport = new FakeTransport();
    const engine = makeEngine({ session: tinyDraft, transport });
    const picks: EngineEvents["pick"][] = [];
    const completed = vi.fn();
    engine.on("pick", (event) => picks.push(event));
    engine.on("completed", completed);
    engine.initializePlayerPool([alpha, bravo]);

    expect(await engine.start(TARGET)).toBe(true);
    for (const frame of [
      "SELECTING 1 30000",
      "SELECTED 1 P1 1",
      "SELECTING 2 30000",
      "SELECTED 2 P2 2"
    ]) {
      transport.receive(frame);
    }

    const rows = picks.map(({ pick }) => [pick.pickNumber, pick.playerName, pick.rosterPosition]);
    expect(rows).toEqual([
      [1, "Alpha Runner", "RB"],
      [2, "Bravo Catcher", "WR"]
    ]);
    expect(completed).toHaveBeenCalledWith({
      totalPicks: 2,
      validation: { isValid: true, errors: [], warnings: [], suggestions: [] }
    });
    expect(engine.getState()).toMatchObject({
      status: "COMPLETED",
      current_pick: 2,
      total_picks: 2,
      on_the_clock: null,
      connection_state: "CONNECTED",
      halted: false
    });
    expect(engine.getMyRoster().RB).toEqual([alpha]);
    expect(engine.getOtherRosters()["2"]?.WR).toEqual([bravo]);
    expect(engine.getAvailablePlayers()).toEqual([]);
    await engine.shutdown();
  });

  it("patches the roster once a pending identity resolves", async () => {
    const engine = makeEngine({ directory: [charlie] });
    const picks: EngineEvents["pick"][] = [];
    const updates: EngineEvents["pick.updated"][] = [];
    engine.on("pick", (event) => picks.push(event));
    engine.on("pick.updated", (event) => updates.push(event));

    engine.ingestFrame("SELECTED 1 P3 1");
    expect(picks[0]?.pick.playerName).toBe("Player #P3");
    expect(engine.getMyRoster().BENCH).toEqual([
      { playerId: "P3", name: "Player #P3", position: "BENCH" }
    ]);

    await engine.resolution.flush();

    expect(engine.getMyRoster().QB).toEqual([charlie]);
    expect(engine.getMyRoster().BENCH).toEqual([]);
    expect(updates).toEqual([
      {
        pick: {
          pickNumber: 1,
          playerId: "P3",
          teamId: "1",
          rosterPosition: "BENCH",
          timestamp: "2024-01-01T00:00:00.000Z",
          playerName: "Charlie Passer"
        },
        player: charlie
      }
    ]);
    expect(engine.getPicks()[0]?.playerName).toBe("Charlie Passer");
    expect(engine.validate().isValid).toBe(true);
  });

  it("heals a corrupting pick by rolling back", () => {
    const engine = makeEngine({});
    const recovered = vi.fn();
    engine.on("recovered", recovered);
    engine.initializePlayerPool(["P1", "P2", "P3"]);

    engine.ingestFrame("SELECTED 1 P1 1");
    engine.ingestFrame("SELECTED 2 P2 7");

    expect(recovered).toHaveBeenCalledWith({
      restoredIndex: 1,
      errors: ["Current pick (7) is too far ahead of completed picks (2)"]
    });
    expect(engine.getPicks().map((pick) => pick.playerId)).toEqual(["P1"]);
    expect(engine.getState().current_pick).toBe(1);
    expect(engine.isHalted).toBe(false);
  });

  it("halts ingestion when no snapshot can restore a valid state", () => {
    const engine = makeEngine({ snapshotCapacity: 1, validateEveryPicks: 2 });
    const violation = vi.fn();
    engine.on("violation", violation);

    engine.ingestFrame("SELECTED 1 P1 5");
    expect(engine.validate().isValid).toBe(false);
    engine.ingestFrame("SELECTED 2 P2 9");

    expect(engine.isHalted).toBe(true);
    expect(violation).toHaveBeenCalledWith({
      message: "Draft state is inconsistent and no valid snapshot is available",
      errors: ["Current pick (9) is too far ahead of completed picks (2)"]
    });
    expect(engine.ingestFrame("SELECTED 3 P3 10")).toBeNull();
    expect(engine.getState().total_picks).toBe(2);
  });

  it("filters available players by resolved position", () => {
    const engine = makeEngine({});
    engine.initializePlayerPool([alpha, bravo, "P5"]);

    expect(engine.getAvailablePlayers("RB")).toEqual([alpha]);
    expect(engine.getAvailablePlayers()).toEqual([
      alpha,
      bravo,
      { playerId: "P5", name: "Player #P5", position: "BENCH" }
    ]);
  });

  it("keeps the first pick after an outage and reports the picks missed", async () => {
    const transport = new FakeTransport({ connect: [true, true] });
    const engine = makeEngine({ transport });
    const seen: string[] = [];
    engine.on("gap", ({ missedPicks, fromPick, toPick }) =>
      seen.push(`gap ${missedPicks} ${fromPick}-${toPick}`)
    );
    engine.on("pick", ({ pick }) => seen.push(`pick ${pick.pickNumber}`));
    const recovered = vi.fn();
    engine.on("recovered", recovered);
    engine.initializePlayerPool(["P1", "P2", "P3", "P4", "P5", "P6"]);
    await engine.start(TARGET);
    transport.receive("SELECTED 1 P1 1");
    transport.receive("SELECTED 2 P2 2");

    transport.drop("io server disconnect");
    await vi.waitFor(() => expect(engine.getState().connection_state).toBe("CONNECTED"));
    transport.receive("SELECTING 1 30000");
    transport.receive("SELECTED 1 P5 5");

    expect(seen).toEqual(["pick 1", "pick 2", "gap 2 3-4", "pick 5"]);
    expect(engine.getPicks().map((pick) => pick.playerId)).toEqual(["P1", "P2", "P5"]);
    expect(engine.getAvailablePlayers().map((player) => player.playerId)).toEqual([
      "P3",
      "P4",
      "P6"
    ]);
    expect(engine.getState()).toMatchObject({ current_pick: 5, total_picks: 3, missed_picks: 2 });
    expect(engine.validate().isValid).toBe(true);
    expect(recovered).not.toHaveBeenCalled();
    expect(engine.getStats().validator).toMatchObject({
      validation_failures: 0,
      state_recoveries: 0
    });
    expect(engine.connection?.pendingResync).toBeNull();

    transport.receive("SELECTING 2 30000");
    transport.receive("SELECTED 2 P6 6");
    expect(engine.getState()).toMatchObject({ current_pick: 6, total_picks: 4 });
    expect(engine.validate().isValid).toBe(true);
    await engine.shutdown();
  });

  it("completes a draft whose remaining picks were missed during an outage", async () => {
    const transport = new FakeTransport({ connect: [true, true] });
    const engine = makeEngine({ session: { ...tinyDraft, rounds: 2 }, transport });
    const completed = vi.fn();
    engine.on("completed", completed);
    await engine.start(TARGET);
    transport.receive("SELECTED 1 P1 1");

    transport.drop("io server disconnect");
    await vi.waitFor(() => expect(engine.getState().connection_state).toBe("CONNECTED"));
    transport.receive("SELECTED 2 P4 4");

    expect(completed).toHaveBeenCalledWith({
      totalPicks: 2,
      validation: {
        isValid: true,
        errors: [],
        warnings: [
          "Draft pick count mismatch: 2 vs expected 4",
          "Team 1 has 1 picks (expected 2)",
          "Team 2 has 1 picks (expected 2)"
        ],
        suggestions: []
      }
    });
    expect(engine.getState()).toMatchObject({ status: "COMPLETED", missed_picks: 2 });
    await engine.shutdown();
  });

  it("reports a connection that cannot be restored", async () => {
    const transport = new FakeTransport({ connect: [true, false] });
    const engine = makeEngine({ transport, maxReconnectAttempts: 2 });
    const failed = vi.fn();
    engine.on("connection.failed", failed);
    await engine.start(TARGET);

    transport.drop("io server disconnect");

    await vi.waitFor(() =>
      expect(failed).toHaveBeenCalledWith({
        code: "RECONNECT_EXHAUSTED",
        message: "Reconnection failed after 2 attempts",
        target: TARGET
      })
    );
    expect(engine.getState().connection_state).toBe("FAILED");
    await engine.shutdown();
  });

  it("idles without a target and reports the connection state", async () => {
    const transport = new FakeTransport();
    const engine = makeEngine({ transport });
    const changes: EngineEvents["connection"][] = [];
    engine.on("connection", (change) => changes.push(change));

    expect(await engine.start(null)).toBe(false);
    expect(engine.getState().connection_state).toBe("DISCONNECTED");

    await engine.connection?.connect(TARGET);
    expect(changes.map((change) => change.to)).toEqual(["CONNECTING", "CONNECTED"]);
    await engine.shutdown();
    expect(transport.closeCalls).toBe(1);
  });

  it("collects statistics from every component", () => {
    const engine = makeEngine({});
    engine.ingestFrame("SELECTED 1 P1 1");
    engine.ingestFrame("bogus frame");
    engine.ingestFrame("CLOCK 1 nope");

    const stats = engine.getStats();
    expect(stats.processor).toMatchObject({ total_messages: 3, parse_errors: 1 });
    expect(stats.store).toMatchObject({ total_picks: 1 });
    expect(stats.validator).toMatchObject({ validation_checks: 1, validation_failures: 0 });
    expect(stats.resolution).toMatchObject({ pending: 1 });
    expect(stats.connection).toBeNull();
  });
});
