import { pickNumberOf } from "@draftwire/shared";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConnectionManager,
  abortableSleep,
  type ConnectionEvents,
  type ConnectionManagerOptions,
  type Sleep
} from "../../src/realtime/connectionManager.js";
import { FakeTransport } from "../support/transport.js";
import { advanceSeconds, freezeTime } from "../support/time.js";

const TARGET = "http://draft.test";

function setup(
  transport: FakeTransport,
  opts: Partial<ConnectionManagerOptions> = {}
) {
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  let pick = 0;
  const manager = new ConnectionManager(transport, {
    lastPick: () => pick,
    sleep,
    now: () => Date.now(),
    ...opts
  });
  const states: ConnectionEvents["state"][] = [];
  manager.on("state", (change) => states.push(change));
  return {
    manager,
    delays,
    states,
    setPick: (value: number) => {
      pick = value;
    }
  };
}

describe("ConnectionManager", () => {
  let restoreTime: (() => void) | null = null;

  afterEach(() => {
    restoreTime?.();
    restoreTime = null;
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("connects and reports a healthy link", async () => {
    const { manager } = setup(new FakeTransport());

    expect(await manager.connect(TARGET)).toBe(true);
    expect(manager.connectionState).toBe("CONNECTED");
    expect(manager.validateConnectionHealth()).toBe(true);
    await manager.shutdown();
  });

  it("stays disconnected when the first connect fails", async () => {
    const { manager, states } = setup(new FakeTransport({ connect: [new Error("refused")] }));

    expect(await manager.connect(TARGET)).toBe(false);
    expect(manager.connectionState).toBe("DISCONNECTED");
    expect(manager.validateConnectionHealth()).toBe(false);
    expect(states.map((change) => change.to)).toEqual(["CONNECTING", "DISCONNECTED"]);
  });

  it("forwards received frames and counts them", async () => {
    const transport = new FakeTransport();
    const { manager } = setup(transport);
    const frames: string[] = [];
    manager.on("frame", ({ frame }) => frames.push(frame));
    await manager.connect(TARGET);

    transport.receive("SELECTING 1 30000");
    transport.receive("PING");

    expect(frames).toEqual(["SELECTING 1 30000", "PING"]);
    expect(manager.getStats().total_messages).toBe(2);
    await manager.shutdown();
  });

  it("fails reconnection immediately without a stored target", async () => {
    const { manager, delays } = setup(new FakeTransport());
    const failed = vi.fn();
    manager.on("failed", failed);

    expect(await manager.reconnectWithBackoff()).toBe(false);
    expect(manager.connectionState).toBe("FAILED");
    expect(delays).toEqual([]);
    expect(failed.mock.calls[0]?.[0].error.code).toBe("NO_TARGET");
  });

  it("backs off between attempts and reconnects", async () => {
    const transport = new FakeTransport({ connect: [true, false, false, true] });
    const { manager, delays } = setup(transport);
    await manager.connect(TARGET);

    expect(await manager.handleDisconnection("heartbeat timeout")).toBe(true);

    expect(delays).toEqual([1000, 2000]);
    expect(manager.connectionState).toBe("CONNECTED");
    expect(transport.connectCalls).toEqual([TARGET, TARGET, TARGET, TARGET]);
    expect(transport.closeCalls).toBe(3);
    expect(manager.getStats()).toMatchObject({
      disconnections: 1,
      total_reconnects: 3,
      successful_reconnects: 1,
      reconnect_attempts: 0
    });
    await manager.shutdown();
  });

  it("gives up after the attempt budget", async () => {
    const transport = new FakeTransport({ connect: [true, false] });
    const { manager, delays } = setup(transport);
    const failed = vi.fn();
    manager.on("failed", failed);
    await manager.connect(TARGET);

    expect(await manager.handleDisconnection("heartbeat timeout")).toBe(false);

    expect(delays).toEqual([1000, 2000, 4000, 8000]);
    expect(manager.connectionState).toBe("FAILED");
    expect(failed.mock.calls[0]?.[0].error.code).toBe("RECONNECT_EXHAUSTED");
  });

  it("logs an exhausted retry budget as an error", async () => {
    vi.stubEnv("LOG_LEVEL", "error");
    vi.stubEnv("LOG_FORMAT", "pretty");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const transport = new FakeTransport({ connect: [true, false] });
    const { manager } = setup(transport);
    await manager.connect(TARGET);

    await manager.handleDisconnection("heartbeat timeout");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(
      'ERROR connection_failed code="RECONNECT_EXHAUSTED" ' +
        'error="Reconnection failed after 5 attempts" target="http://draft.test"'
    );
  });

  it("repeats the longest delay once the schedule runs out", async () => {
    const transport = new FakeTransport({ connect: [true, false] });
    const { manager, delays } = setup(transport, { maxReconnectAttempts: 7 });
    await manager.connect(TARGET);

    await manager.handleDisconnection("heartbeat timeout");

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 16000]);
  });

  it("prefers a lightweight refresh over a full reconnect", async () => {
    const transport = new FakeTransport({ refresh: [true] });
    const { manager, delays } = setup(transport);
    await manager.connect(TARGET);

    expect(await manager.handleDisconnection("heartbeat timeout")).toBe(true);

    expect(transport.refreshCalls).toBe(1);
    expect(transport.connectCalls).toEqual([TARGET]);
    expect(transport.closeCalls).toBe(0);
    expect(delays).toEqual([]);
    await manager.shutdown();
  });

  it("runs a single recovery for near-simultaneous disconnections", async () => {
    const transport = new FakeTransport({ connect: [true, false, true] });
    const { manager, states } = setup(transport);
    await manager.connect(TARGET);

    const first = manager.handleDisconnection("heartbeat timeout");
    const second = manager.handleDisconnection("heartbeat timeout");

    expect(second).toBe(first);
    expect(await first).toBe(true);
    expect(manager.getStats().disconnections).toBe(1);
    expect(transport.connectCalls).toHaveLength(3);
    expect(states.filter((change) => change.to === "RECONNECTING")).toHaveLength(1);
    await manager.shutdown();
  });

  it("reports picks applied during recovery when frames are not read for picks", async () => {
    const transport = new FakeTransport();
    const { manager, setPick } = setup(transport);
    const gaps = vi.fn();
    manager.on("gap", gaps);
    setPick(3);
    await manager.connect(TARGET);

    const recovery = manager.handleDisconnection("transport error");
    expect(manager.pendingResync?.lastKnownPickNumber).toBe(3);
    setPick(6);
    await recovery;

    expect(gaps).toHaveBeenCalledWith({ missedPicks: 3, fromPick: 4, toPick: 6 });
    expect(manager.pendingResync).toBeNull();
    expect(manager.getStats().missed_picks).toBe(3);
    await manager.shutdown();
  });

  it("holds the resync until a frame reports a pick", async () => {
    const transport = new FakeTransport({ connect: [true, true] });
    const { manager, setPick } = setup(transport, { pickOf: pickNumberOf });
    const seen: string[] = [];
    manager.on("gap", ({ missedPicks, fromPick, toPick }) =>
      seen.push(`gap ${missedPicks} ${fromPick}-${toPick}`)
    );
    manager.on("frame", ({ frame }) => seen.push(frame));
    setPick(2);
    await manager.connect(TARGET);

    expect(await manager.handleDisconnection("transport error")).toBe(true);
    expect(manager.pendingResync?.lastKnownPickNumber).toBe(2);

    transport.receive("SELECTING 1 30000");
    expect(manager.pendingResync).not.toBeNull();
    transport.receive("SELECTED 1 P5 5");

    expect(seen).toEqual(["SELECTING 1 30000", "gap 2 3-4", "SELECTED 1 P5 5"]);
    expect(manager.pendingResync).toBeNull();
    expect(manager.getStats().missed_picks).toBe(2);
    await manager.shutdown();
  });

  it("clears the pending resync without a gap when the next pick follows on", async () => {
    const transport = new FakeTransport({ connect: [true, true] });
    const { manager, setPick } = setup(transport, { pickOf: pickNumberOf });
    const gaps = vi.fn();
    manager.on("gap", gaps);
    setPick(2);
    await manager.connect(TARGET);
    await manager.handleDisconnection("transport error");

    transport.receive("SELECTED 1 P3 3");

    expect(gaps).not.toHaveBeenCalled();
    expect(manager.pendingResync).toBeNull();
    expect(manager.getStats().missed_picks).toBe(0);
    await manager.shutdown();
  });

  it("reports no gap when nothing was missed", async () => {
    const { manager } = setup(new FakeTransport());
    expect(manager.resynchronizeState()).toBeNull();

    await manager.connect(TARGET);
    await manager.handleDisconnection("transport error");
    expect(manager.getStats().missed_picks).toBe(0);
    await manager.shutdown();
  });

  it("recovers when the transport reports a close", async () => {
    const transport = new FakeTransport({ connect: [true, true] });
    const { manager, states } = setup(transport);
    await manager.connect(TARGET);

    transport.drop("io server disconnect");
    expect(manager.connectionState).toBe("RECONNECTING");
    await manager.handleDisconnection("joins the running recovery");

    expect(manager.connectionState).toBe("CONNECTED");
    expect(states.find((change) => change.to === "RECONNECTING")?.reason).toBe(
      "transport closed: io server disconnect"
    );
    await manager.shutdown();
  });

  it("ignores transport closes when recovery is disabled", async () => {
    const transport = new FakeTransport();
    const { manager } = setup(transport, { recoveryEnabled: false });
    await manager.connect(TARGET);

    transport.drop();

    expect(manager.connectionState).toBe("CONNECTED");
    await manager.shutdown();
  });

  it("treats a silent link as disconnected after the heartbeat timeout", async () => {
    restoreTime = freezeTime();
    const transport = new FakeTransport({ connect: [true, true] });
    const { manager, states } = setup(transport, {
      heartbeatTimeoutMs: 30_000,
      heartbeatIntervalMs: 5_000
    });
    await manager.connect(TARGET);

    await advanceSeconds(30);
    expect(states.some((change) => change.to === "RECONNECTING")).toBe(false);

    await advanceSeconds(5);
    await vi.waitFor(() =>
      expect(states.map((change) => change.to)).toEqual([
        "CONNECTING",
        "CONNECTED",
        "RECONNECTING",
        "CONNECTED"
      ])
    );
    expect(states[2]?.reason).toBe("heartbeat timeout");
    await manager.shutdown();
  });

  it("stays connected while frames keep arriving", async () => {
    restoreTime = freezeTime();
    const transport = new FakeTransport();
    const { manager } = setup(transport, {
      heartbeatTimeoutMs: 30_000,
      heartbeatIntervalMs: 5_000
    });
    await manager.connect(TARGET);

    for (let i = 0; i < 4; i += 1) {
      await advanceSeconds(20);
      transport.receive("PING");
    }

    expect(manager.connectionState).toBe("CONNECTED");
    expect(manager.getStats().disconnections).toBe(0);
    await manager.shutdown();
  });

  it("aborts a backoff sleep on shutdown", async () => {
    let sleeping = false;
    const transport = new FakeTransport({ connect: [true, false] });
    const { manager } = setup(transport, {
      sleep: (_ms, signal) =>
        new Promise<void>((resolve) => {
          sleeping = true;
          signal.addEventListener("abort", () => resolve(), { once: true });
        })
    });
    await manager.connect(TARGET);

    const recovery = manager.handleDisconnection("heartbeat timeout");
    await vi.waitFor(() => expect(sleeping).toBe(true));
    await manager.shutdown();

    expect(await recovery).toBe(false);
    expect(manager.connectionState).toBe("DISCONNECTED");
    expect(await manager.handleDisconnection("after shutdown")).toBe(false);
  });
});

describe("abortableSleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let settled = false;
    const sleeping = abortableSleep(1000, new AbortController().signal);
    sleeping.then(() => {
      settled = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await expect(sleeping).resolves.toBeUndefined();
    expect(settled).toBe(true);
  });

  it("resolves early when aborted", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });
});
