import "dotenv/config";
import { createServer as createHttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { loadConfig } from "./config/env.js";
import { createPool, poolRunner } from "./data/db.js";
import { listDraftablePlayers } from "./data/repositories/playerRepository.js";
import { errorMessage, log } from "./logger.js";
import { registerDraftNamespace } from "./realtime/draftNamespace.js";
import {
  bridgeEngineEvents,
  clearDraftEventEmitter,
  registerDraftEventEmitter
} from "./realtime/draftEvents.js";
import { SocketIoFrameTransport } from "./realtime/frameTransport.js";
import { createServer } from "./server.js";
import { DraftEngine } from "./services/draftEngine.js";
import {
  StaticPlayerDirectory,
  createPgPlayerDirectory,
  type PlayerIdentity
} from "./services/playerDirectory.js";

async function main() {
  const config = loadConfig();
  const pool = config.databaseUrl ? createPool(config.databaseUrl) : null;
  const runner = pool ? poolRunner(pool) : null;

  const engine = new DraftEngine({
    session: {
      leagueId: config.leagueId,
      myTeamId: config.teamId,
      teamCount: config.teamCount,
      rounds: config.rounds
    },
    directory: runner ? createPgPlayerDirectory(runner) : new StaticPlayerDirectory(),
    transport: new SocketIoFrameTransport(),
    snapshotCapacity: config.snapshotCapacity,
    validateEveryPicks: config.validateEveryPicks,
    resolutionIntervalMs: config.resolutionIntervalMs,
    connection: {
      heartbeatTimeoutMs: config.heartbeatTimeoutMs,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      maxReconnectAttempts: config.maxReconnectAttempts
    }
  });

  if (config.draftOrder.length > 0) engine.setDraftOrder(config.draftOrder);
  if (runner) {
    const players = await listDraftablePlayers(runner);
    engine.initializePlayerPool(
      players.map(
        (record): PlayerIdentity => ({
          playerId: record.player_id,
          name: record.name,
          position: record.position
        })
      )
    );
  }

  const app = createServer({ engine });
  const httpServer = createHttpServer(app);

  let unbridge: (() => void) | null = null;
  if (config.realtimeEnabled) {
    const io = new SocketIOServer(httpServer, { serveClient: false });
    registerDraftEventEmitter(registerDraftNamespace(io, { engine }));
    unbridge = bridgeEngineEvents(engine);
  } else {
    clearDraftEventEmitter();
  }

  let stopping = false;
  async function stop(exitCode: number) {
    if (stopping) return;
    stopping = true;
    unbridge?.();
    await engine.shutdown();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await pool?.end();
    process.exit(exitCode);
  }

  engine.on("violation", ({ errors }) => {
    log({ level: "error", msg: "engine_violation_exit", errors });
    stop(1).catch((err: unknown) => {
      log({ level: "error", msg: "shutdown_failed", error: errorMessage(err) });
      process.exit(1);
    });
  });
  engine.on("connection.failed", ({ code, target }) => {
    log({ level: "error", msg: "engine_feed_lost_exit", code, target });
    stop(1).catch((err: unknown) => {
      log({ level: "error", msg: "shutdown_failed", error: errorMessage(err) });
      process.exit(1);
    });
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(0).catch((err: unknown) => {
        log({ level: "error", msg: "shutdown_failed", error: errorMessage(err) });
        process.exit(1);
      });
    });
  }

  await new Promise<void>((resolve) => httpServer.listen(config.port, resolve));
  log({ level: "info", msg: "engine_listening", port: config.port });
  await engine.start(config.draftUrl);
}

main().catch((err: unknown) => {
  log({ level: "error", msg: "engine_start_failed", error: errorMessage(err) });
  process.exit(1);
});
