import express from "express";
import type { Router } from "express";
import { DEFAULT_ROSTER_POSITIONS } from "../domain/draftStore.js";
import { validationError } from "../errors.js";
import type { DraftEngine } from "../services/draftEngine.js";

function parsePosition(raw: unknown): string | undefined {
  if (raw === undefined) return undefined;
  const value = typeof raw === "string" ? raw.trim().toUpperCase() : "";
  if (!DEFAULT_ROSTER_POSITIONS.includes(value)) {
    throw validationError(
      `position must be one of ${DEFAULT_ROSTER_POSITIONS.join(", ")}`,
      ["position"]
    );
  }
  return value;
}

export function createDraftRouter(engine: DraftEngine): Router {
  const router = express.Router();

  router.get("/state", (_req, res) => {
    res.status(200).json(engine.getState());
  });

  router.get("/roster", (_req, res) => {
    res.status(200).json({
      team_id: engine.store.session.myTeamId,
      roster: engine.getMyRoster()
    });
  });

  router.get("/rosters", (_req, res) => {
    res.status(200).json({ rosters: engine.getOtherRosters() });
  });

  router.get("/available", (req, res, next) => {
    try {
      const position = parsePosition(req.query.position);
      const players = engine.getAvailablePlayers(position);
      res.status(200).json({ position: position ?? null, count: players.length, players });
    } catch (err) {
      next(err);
    }
  });

  router.get("/picks", (_req, res) => {
    res.status(200).json({ picks: engine.getPicks() });
  });

  router.get("/stats", (_req, res) => {
    res.status(200).json(engine.getStats());
  });

  // Read-only check; healing only runs on the ingestion path.
  router.get("/validate", (_req, res) => {
    res.status(200).json(engine.validate());
  });

  return router;
}
