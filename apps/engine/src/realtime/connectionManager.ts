import { ListenerRegistry } from "../lib/listeners.js";
import { errorMessage, log } from "../logger.js";
import type { FrameTransport } from "./frameTransport.js";

export type ConnectionState =
  | "DISCONNECTED"
  | "CONNECTING"
  | "CONNECTED"
  | "RECONNECTING"
  | "FAILED";

export const DEFAULT_BACKOFF_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];

export type ConnectionErrorCode = "CONNECT_FAILED" | "NO_TARGET" | "RECONNECT_EXHAUSTED";

export class ConnectionError extends Error {
  constructor(
    message: string,
    public code: ConnectionErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ConnectionError";
  }
}

export type PreDisconnectState = {
  lastKnownPickNumber: number;
  messageCount: number;
  timestamp: string;
};

export type ConnectionEvents = {
  frame: { frame: string };
  state: { from: ConnectionState; to: ConnectionState; reason: string | null };
  gap: { missedPicks: number; fromPick: number; toPick: number };
  failed: { error: ConnectionError };
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export type ConnectionManagerOptions = {
  /** Overall number of the last pick the pipeline has applied. */
  lastPick: () => number;
  /**
   * Reads the overall pick number a received frame reports. When set, the
   * resync after a reconnect waits for the first frame that reports one.
   */
  pickOf?: (frame: string) => number | null;
  heartbeatTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  maxReconnectAttempts?: number;
  backoffDelaysMs?: readonly number[];
  recoveryEnabled?: boolean;
  now?: () => number;
  sleep?: Sleep;
};

/**
 * Keeps the frame transport alive: heartbeat monitoring, bounded exponential
 * backoff reconnection, and gap detection once the link is back.
 */
export class ConnectionManager {
  private readonly listeners = new ListenerRegistry<ConnectionEvents>("connection_manager");
  private readonly unsubscribe: Array<() => void> = [];
  private readonly abort = new AbortController();

  private state: ConnectionState = "DISCONNECTED";
  private lastTarget: string | null = null;
  private lastHeartbeat: number;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private recovery: Promise<boolean> | null = null;
  private preDisconnect: PreDisconnectState | null = null;
  private shuttingDown = false;

  private messageCount = 0;
  private framesSent = 0;
  private reconnectAttempts = 0;
  private stats = {
    disconnections: 0,
    total_reconnects: 0,
    successful_reconnects: 0,
    missed_picks: 0
  };

  private readonly lastPick: () => number;
  private readonly pickOf: ((frame: string) => number | null) | null;
  private readonly heartbeatTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly backoffDelaysMs: readonly number[];
  private readonly recoveryEnabled: boolean;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(
    private readonly transport: FrameTransport,
    opts: ConnectionManagerOptions
  ) {
    this.lastPick = opts.lastPick;
    this.pickOf = opts.pickOf ?? null;
    this.heartbeatTimeoutMs = opts.heartbeatTimeoutMs ?? 30_000;
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs ?? 5_000;
    this.maxReconnectAttempts = opts.maxReconnectAttempts ?? 5;
    this.backoffDelaysMs =
      opts.backoffDelaysMs && opts.backoffDelaysMs.length > 0
        ? [...opts.backoffDelaysMs]
        : DEFAULT_BACKOFF_DELAYS_MS;
    this.recoveryEnabled = opts.recoveryEnabled ?? true;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? abortableSleep;
    this.lastHeartbeat = this.now();

    this.unsubscribe.push(
      transport.onFrame((direction, frame) => {
        if (direction === "sent") {
          this.framesSent += 1;
          return;
        }
        this.lastHeartbeat = this.now();
        this.messageCount += 1;
        this.resyncFromFrame(frame);
        this.listeners.emit("frame", { frame });
      }),
      transport.onClose((reason) => {
        if (!this.recoveryEnabled || this.state !== "CONNECTED") return;
        this.handleDisconnection(`transport closed: ${reason}`).catch((err: unknown) => {
          log({ level: "error", msg: "recovery_failed", error: errorMessage(err) });
        });
      })
    );
  }

  on<K extends keyof ConnectionEvents>(
    event: K,
    listener: (payload: ConnectionEvents[K]) => void
  ) {
    return this.listeners.on(event, listener);
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get target(): string | null {
    return this.lastTarget;
  }

  get pendingResync(): PreDisconnectState | null {
    return this.preDisconnect ? { ...this.preDisconnect } : null;
  }

  async connect(target: string): Promise<boolean> {
    this.lastTarget = target;
    this.setState("CONNECTING", null);
    const ok = await this.openTransport(target);
    if (!ok) {
      const error = new ConnectionError(`Could not connect to ${target}`, "CONNECT_FAILED", {
        target
      });
      log({ level: "warn", msg: "connect_failed", target, error: error.message });
      this.setState("DISCONNECTED", error.message);
      return false;
    }
    this.markConnected();
    log({ level: "info", msg: "connected", target });
    return true;
  }

  validateConnectionHealth(): boolean {
    return (
      this.state === "CONNECTED" && this.now() - this.lastHeartbeat <= this.heartbeatTimeoutMs
    );
  }

  /**
   * Starts recovery for a lost link. While a recovery is running, further
   * calls join it instead of starting another.
   */
  handleDisconnection(reason: string): Promise<boolean> {
    if (this.recovery) {
      log({ level: "debug", msg: "recovery_already_running", reason });
      return this.recovery;
    }
    if (this.shuttingDown) return Promise.resolve(false);
    this.recovery = this.recover(reason).finally(() => {
      this.recovery = null;
    });
    return this.recovery;
  }

  async reconnectWithBackoff(): Promise<boolean> {
    const target = this.lastTarget;
    if (!target) {
      this.fail(new ConnectionError("No connection target to reconnect to", "NO_TARGET"));
      return false;
    }

    for (let attempt = 1; attempt <= this.maxReconnectAttempts; attempt += 1) {
      if (attempt > 1) {
        const delay =
          this.backoffDelaysMs[Math.min(attempt - 2, this.backoffDelaysMs.length - 1)] ?? 0;
        await this.sleep(delay, this.abort.signal);
      }
      if (this.abort.signal.aborted) return false;

      this.reconnectAttempts = attempt;
      this.stats.total_reconnects += 1;
      log({
        level: "info",
        msg: "reconnect_attempt",
        attempt,
        max_attempts: this.maxReconnectAttempts,
        target
      });

      if (await this.tryReconnect(target)) {
        this.stats.successful_reconnects += 1;
        log({ level: "info", msg: "reconnected", attempt });
        this.reconnectAttempts = 0;
        this.markConnected();
        return true;
      }
    }

    if (this.abort.signal.aborted) return false;
    this.fail(
      new ConnectionError(
        `Reconnection failed after ${this.maxReconnectAttempts} attempts`,
        "RECONNECT_EXHAUSTED",
        { attempts: this.maxReconnectAttempts, target }
      )
    );
    return false;
  }

  /**
   * Compares the last pick known before the outage with the first pick seen
   * after it and reports the picks in between as a gap. `nextPick` defaults
   * to the pick after the last one the pipeline has applied.
   */
  resynchronizeState(nextPick: number = this.lastPick() + 1): { missedPicks: number } | null {
    const before = this.preDisconnect;
    if (!before) return null;
    this.preDisconnect = null;
    const fromPick = before.lastKnownPickNumber + 1;
    const toPick = nextPick - 1;
    const missedPicks = Math.max(0, toPick - fromPick + 1);

    if (missedPicks > 0) {
      this.stats.missed_picks += missedPicks;
      log({
        level: "warn",
        msg: "picks_missed_during_outage",
        missed_picks: missedPicks,
        from_pick: fromPick,
        to_pick: toPick
      });
      this.listeners.emit("gap", { missedPicks, fromPick, toPick });
    } else {
      log({ level: "info", msg: "resynchronized", next_pick: nextPick });
    }
    return { missedPicks };
  }

  async shutdown() {
    this.shuttingDown = true;
    this.abort.abort();
    this.stopHeartbeat();
    const running = this.recovery;
    if (running) {
      await running.catch((err: unknown) => {
        log({ level: "warn", msg: "recovery_interrupted", error: errorMessage(err) });
      });
    }
    await this.transport.close();
    for (const off of this.unsubscribe.splice(0)) off();
    this.setState("DISCONNECTED", "shutdown");
    log({ level: "info", msg: "connection_shutdown" });
  }

  getStats() {
    return {
      state: this.state,
      target: this.lastTarget,
      connection_healthy: this.validateConnectionHealth(),
      total_messages: this.messageCount,
      frames_sent: this.framesSent,
      last_heartbeat: new Date(this.lastHeartbeat).toISOString(),
      reconnect_attempts: this.reconnectAttempts,
      ...this.stats
    };
  }

  private async recover(reason: string): Promise<boolean> {
    this.stopHeartbeat();
    this.stats.disconnections += 1;
    this.setState("RECONNECTING", reason);
    // An earlier outage whose resync is still pending keeps its starting point.
    const before: PreDisconnectState = this.preDisconnect ?? {
      lastKnownPickNumber: this.lastPick(),
      messageCount: this.messageCount,
      timestamp: new Date(this.now()).toISOString()
    };
    this.preDisconnect = before;
    log({ level: "warn", msg: "connection_lost", reason, last_pick: before.lastKnownPickNumber });

    const ok = await this.reconnectWithBackoff();
    if (!ok) return false;
    if (!this.pickOf) {
      this.resynchronizeState();
    } else if (this.preDisconnect) {
      log({ level: "info", msg: "resync_pending", last_pick: before.lastKnownPickNumber });
    }
    return true;
  }

  private resyncFromFrame(frame: string) {
    if (!this.preDisconnect || !this.pickOf || this.state !== "CONNECTED") return;
    const pick = this.pickOf(frame);
    if (pick !== null) this.resynchronizeState(pick);
  }

  private async tryReconnect(target: string): Promise<boolean> {
    if (this.transport.refresh) {
      try {
        if (await this.transport.refresh()) return true;
      } catch (err) {
        log({ level: "debug", msg: "transport_refresh_failed", error: errorMessage(err) });
      }
    }
    try {
      await this.transport.close();
    } catch (err) {
      log({ level: "debug", msg: "transport_close_failed", error: errorMessage(err) });
    }
    return this.openTransport(target);
  }

  private async openTransport(target: string): Promise<boolean> {
    try {
      return await this.transport.connect(target);
    } catch (err) {
      log({ level: "warn", msg: "transport_connect_error", target, error: errorMessage(err) });
      return false;
    }
  }

  private markConnected() {
    this.lastHeartbeat = this.now();
    this.setState("CONNECTED", null);
    this.startHeartbeat();
  }

  private fail(error: ConnectionError) {
    this.stopHeartbeat();
    log({
      level: "error",
      msg: "connection_failed",
      code: error.code,
      target: this.lastTarget,
      error: error.message
    });
    this.setState("FAILED", error.message);
    this.listeners.emit("failed", { error });
  }

  private startHeartbeat() {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.checkHeartbeat(), this.heartbeatIntervalMs);
  }

  private stopHeartbeat() {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
  }

  private checkHeartbeat() {
    if (this.state !== "CONNECTED") return;
    const silentFor = this.now() - this.lastHeartbeat;
    if (silentFor <= this.heartbeatTimeoutMs) return;
    log({ level: "warn", msg: "heartbeat_timeout", silent_ms: silentFor });
    if (!this.recoveryEnabled) {
      this.stopHeartbeat();
      this.setState("DISCONNECTED", "heartbeat timeout");
      return;
    }
    this.handleDisconnection("heartbeat timeout").catch((err: unknown) => {
      log({ level: "error", msg: "recovery_failed", error: errorMessage(err) });
    });
  }

  private setState(next: ConnectionState, reason: string | null) {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    log({ level: "debug", msg: "connection_state_changed", from, to: next, reason });
    this.listeners.emit("state", { from, to: next, reason });
  }
}
