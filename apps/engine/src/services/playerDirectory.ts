import type { QueryRunner } from "../data/db.js";
import { getPlayersByIds } from "../data/repositories/playerRepository.js";

export type PlayerIdentity = {
  playerId: string;
  name: string;
  position: string;
};

export interface PlayerDirectory {
  /** Looks up a batch of ids; ids the directory does not know map to `null`. */
  resolveMany(ids: readonly string[]): Promise<Map<string, PlayerIdentity | null>>;
}

export class StaticPlayerDirectory implements PlayerDirectory {
  private readonly players = new Map<string, PlayerIdentity>();

  constructor(players: readonly PlayerIdentity[] = []) {
    for (const player of players) this.players.set(player.playerId, { ...player });
  }

  async resolveMany(ids: readonly string[]) {
    return new Map(ids.map((id) => [id, this.players.get(id) ?? null] as const));
  }
}

export function createPgPlayerDirectory(client: QueryRunner): PlayerDirectory {
  return {
    async resolveMany(ids) {
      const records = await getPlayersByIds(client, ids);
      const byId = new Map(records.map((record) => [record.player_id, record]));
      return new Map(
        ids.map((id) => {
          const record = byId.get(id);
          const identity: PlayerIdentity | null = record
            ? { playerId: record.player_id, name: record.name, position: record.position }
            : null;
          return [id, identity] as const;
        })
      );
    }
  };
}
