import type { Namespace, Server } from "socket.io";
import type { DraftEngine } from "../services/draftEngine.js";
import { log } from "../logger.js";

export const DRAFT_NAMESPACE = "/draft";
export const DRAFT_ROOM = "draft:watchers";

export function registerDraftNamespace(io: Server, opts: { engine: DraftEngine }): Namespace {
  const nsp = io.of(DRAFT_NAMESPACE);

  nsp.on("connection", (socket) => {
    socket.join(DRAFT_ROOM);
    socket.emit("draft:state", opts.engine.getState());
    log({ level: "debug", msg: "draft_watcher_connected", socket_id: socket.id });

    socket.on("draft:sync", () => {
      socket.emit("draft:state", opts.engine.getState());
    });
  });

  return nsp;
}

export function emitToWatchers(nsp: Namespace, event: string, payload: unknown) {
  nsp.to(DRAFT_ROOM).emit(event, payload);
}
