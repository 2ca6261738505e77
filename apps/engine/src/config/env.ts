export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key];
  if (value === undefined || value.trim() === "") return null;
  return value.trim();
}

function parsePort(portValue: string): number {
  const parsed = Number(portValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`PORT must be a positive integer, received: ${portValue}`);
  }
  return parsed;
}

function parseOptionalInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const value = optionalEnv(env, key);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

function parseOptionalBool(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean
): boolean {
  const value = optionalEnv(env, key);
  if (value === null) return fallback;
  const normalized = value.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}

function parseList(value: string | null): string[] {
  if (value === null) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export type EngineConfig = {
  port: number;
  leagueId: string;
  teamId: string;
  teamCount: number;
  rounds: number;
  draftUrl: string | null;
  draftOrder: string[];
  databaseUrl: string | null;
  realtimeEnabled: boolean;
  heartbeatTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxReconnectAttempts: number;
  snapshotCapacity: number;
  validateEveryPicks: number;
  resolutionIntervalMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const port = parsePort(requireEnv(env, "PORT"));
  const leagueId = requireEnv(env, "LEAGUE_ID");
  const teamId = requireEnv(env, "TEAM_ID");
  const teamCount = parseOptionalInt(env, "TEAM_COUNT", 12);
  const draftOrder = parseList(optionalEnv(env, "DRAFT_ORDER"));
  if (draftOrder.length > 0 && draftOrder.length !== teamCount) {
    throw new ConfigError(
      `DRAFT_ORDER lists ${draftOrder.length} teams but TEAM_COUNT is ${teamCount}`
    );
  }

  return {
    port,
    leagueId,
    teamId,
    teamCount,
    rounds: parseOptionalInt(env, "ROUNDS", 16),
    draftUrl: optionalEnv(env, "DRAFT_URL"),
    draftOrder,
    databaseUrl: optionalEnv(env, "DATABASE_URL"),
    realtimeEnabled: parseOptionalBool(env, "REALTIME_ENABLED", true),
    heartbeatTimeoutMs: parseOptionalInt(env, "HEARTBEAT_TIMEOUT_MS", 30_000),
    heartbeatIntervalMs: parseOptionalInt(env, "HEARTBEAT_INTERVAL_MS", 5_000),
    maxReconnectAttempts: parseOptionalInt(env, "MAX_RECONNECT_ATTEMPTS", 5),
    snapshotCapacity: parseOptionalInt(env, "SNAPSHOT_CAPACITY", 100),
    validateEveryPicks: parseOptionalInt(env, "VALIDATE_EVERY_PICKS", 1),
    resolutionIntervalMs: parseOptionalInt(env, "RESOLUTION_INTERVAL_MS", 1_000)
  };
}
