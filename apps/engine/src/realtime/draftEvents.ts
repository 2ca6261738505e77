import type { Namespace } from "socket.io";
import type { DraftEngine, EngineEvents } from "../services/draftEngine.js";
import { emitToWatchers } from "./draftNamespace.js";

export type DraftEventMessage = {
  type: string;
  payload: unknown;
  emitted_at: string;
};

type DraftEventEmitter = (event: DraftEventMessage) => void;

const broadcastEvents = [
  "pick",
  "pick.updated",
  "gap",
  "completed",
  "connection",
  "connection.failed"
] as const;

let emitter: DraftEventEmitter | null = null;

export function registerDraftEventEmitter(nsp: Namespace) {
  emitter = (event) => {
    emitToWatchers(nsp, "draft:event", event);
  };
}

export function clearDraftEventEmitter() {
  emitter = null;
}

export function emitDraftEvent(type: keyof EngineEvents, payload: unknown, at: Date = new Date()) {
  if (!emitter) return;
  emitter({ type, payload, emitted_at: at.toISOString() });
}

/** Forwards the engine's notifications to socket watchers. Returns an unsubscribe. */
export function bridgeEngineEvents(engine: DraftEngine): () => void {
  const offs = broadcastEvents.map((type) =>
    engine.on(type, (payload) => emitDraftEvent(type, payload))
  );
  return () => {
    for (const off of offs) off();
  };
}
