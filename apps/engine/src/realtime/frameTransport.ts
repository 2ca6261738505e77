import { io, type Socket } from "socket.io-client";
import { ListenerRegistry } from "../lib/listeners.js";
import { log } from "../logger.js";

export type FrameDirection = "received" | "sent";

/**
 * Carries raw protocol frames to and from the draft room. Implementations do
 * no parsing; they only report frames and the loss of the underlying link.
 */
export interface FrameTransport {
  connect(target: string): Promise<boolean>;
  /** Cheap liveness re-check on the existing link, when the transport has one. */
  refresh?(): Promise<boolean>;
  close(): Promise<void>;
  onFrame(listener: (direction: FrameDirection, frame: string) => void): () => void;
  onClose(listener: (reason: string) => void): () => void;
}

type TransportEvents = {
  frame: { direction: FrameDirection; frame: string };
  close: { reason: string };
};

export const FRAME_EVENT = "message";

export class SocketIoFrameTransport implements FrameTransport {
  private readonly listeners = new ListenerRegistry<TransportEvents>("frame_transport");
  private socket: Socket | null = null;
  private closing = false;
  private readonly connectTimeoutMs: number;

  constructor(opts: { connectTimeoutMs?: number } = {}) {
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 5000;
  }

  get connected(): boolean {
    return this.socket?.connected ?? false;
  }

  async connect(target: string): Promise<boolean> {
    await this.close();
    this.closing = false;

    const socket = io(target, {
      transports: ["websocket"],
      reconnection: false,
      forceNew: true,
      timeout: this.connectTimeoutMs
    });
    this.socket = socket;

    socket.on(FRAME_EVENT, (payload: unknown) => {
      if (typeof payload !== "string") {
        log({ level: "debug", msg: "frame_ignored_non_text", type: typeof payload });
        return;
      }
      this.listeners.emit("frame", { direction: "received", frame: payload });
    });
    socket.on("disconnect", (reason: string) => {
      if (this.closing || this.socket !== socket) return;
      log({ level: "warn", msg: "transport_closed", reason });
      this.listeners.emit("close", { reason });
    });

    const ok = await this.waitForConnect(socket);
    if (!ok) {
      socket.removeAllListeners();
      socket.disconnect();
      if (this.socket === socket) this.socket = null;
    }
    return ok;
  }

  async refresh(): Promise<boolean> {
    const socket = this.socket;
    if (!socket) return false;
    if (socket.connected) return true;
    socket.connect();
    return this.waitForConnect(socket);
  }

  send(frame: string) {
    if (!this.socket?.connected) {
      log({ level: "warn", msg: "frame_send_while_disconnected" });
      return false;
    }
    this.socket.emit(FRAME_EVENT, frame);
    this.listeners.emit("frame", { direction: "sent", frame });
    return true;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.closing = true;
    this.socket = null;
    socket.removeAllListeners();
    socket.disconnect();
  }

  onFrame(listener: (direction: FrameDirection, frame: string) => void) {
    return this.listeners.on("frame", ({ direction, frame }) => listener(direction, frame));
  }

  onClose(listener: (reason: string) => void) {
    return this.listeners.on("close", ({ reason }) => listener(reason));
  }

  private waitForConnect(socket: Socket): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      if (socket.connected) {
        resolve(true);
        return;
      }
      const timer = setTimeout(() => finish(false), this.connectTimeoutMs);
      const onConnect = () => finish(true);
      const onError = (err: Error) => {
        log({ level: "warn", msg: "transport_connect_failed", error: err.message });
        finish(false);
      };
      function finish(ok: boolean) {
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("connect_error", onError);
        resolve(ok);
      }
      socket.once("connect", onConnect);
      socket.once("connect_error", onError);
    });
  }
}
