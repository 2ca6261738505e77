import { queryRows, type QueryRunner } from "../db.js";

export type PlayerRecord = {
  player_id: string;
  name: string;
  position: string;
  draft_rank: number | null;
};

function field(row: object, key: string): unknown {
  return key in row ? Reflect.get(row, key) : undefined;
}

function toPlayerRecord(row: unknown): PlayerRecord | null {
  if (!row || typeof row !== "object") return null;
  const playerId = field(row, "player_id");
  const name = field(row, "name");
  const position = field(row, "position");
  const rank = field(row, "draft_rank");
  if (typeof playerId !== "string" || typeof name !== "string" || typeof position !== "string") {
    return null;
  }
  return {
    player_id: playerId,
    name,
    position: position.toUpperCase(),
    draft_rank: typeof rank === "number" ? rank : null
  };
}

export async function getPlayersByIds(
  client: QueryRunner,
  ids: readonly string[]
): Promise<PlayerRecord[]> {
  if (ids.length === 0) return [];
  const rows = await queryRows(
    client,
    `
      SELECT player_id, name, position, draft_rank::int AS draft_rank
      FROM player
      WHERE player_id = ANY($1::text[])
    `,
    [[...ids]]
  );
  return rows.map(toPlayerRecord).filter((record): record is PlayerRecord => record !== null);
}

export async function listDraftablePlayers(client: QueryRunner): Promise<PlayerRecord[]> {
  const rows = await queryRows(
    client,
    `
      SELECT player_id, name, position, draft_rank::int AS draft_rank
      FROM player
      WHERE draftable
      ORDER BY draft_rank ASC NULLS LAST, player_id ASC
    `
  );
  return rows.map(toPlayerRecord).filter((record): record is PlayerRecord => record !== null);
}
