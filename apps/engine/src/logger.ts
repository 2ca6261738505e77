type Level = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

type LogLevelSetting = "silent" | Level;

const LEVEL_RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isTestRuntime(): boolean {
  // Vitest sets NODE_ENV="test" in many setups, but don't rely on it.
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

function getConfiguredLevel(): LogLevelSetting {
  const raw = String(process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "silent" || raw === "error" || raw === "warn" || raw === "info" || raw === "debug") {
    return raw;
  }
  if (isTestRuntime()) return "silent";
  return "info";
}

export function shouldLog(entryLevel: Level): boolean {
  const configured = getConfiguredLevel();
  if (configured === "silent") return false;
  return LEVEL_RANK[entryLevel] >= LEVEL_RANK[configured];
}

function wantsPrettyOutput(): boolean {
  const raw = String(process.env.LOG_FORMAT || "").toLowerCase();
  if (raw === "json") return false;
  if (raw === "pretty") return true;
  // Default: in tests, keep output readable; elsewhere keep structured JSON.
  return isTestRuntime();
}

function formatKeyValue(key: string, value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return `${key}=null`;
  if (typeof value === "string") return `${key}="${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return `${key}=${value}`;
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

export function toPrettyLine(entry: LogEntry): string {
  const { level, msg, ...rest } = entry;

  if (msg === "request") {
    const method = rest.method ? String(rest.method) : "?";
    const p = rest.path ? String(rest.path) : "?";
    const status = rest.status ? String(rest.status) : "?";
    const duration =
      typeof rest.duration_ms === "number" ? `${rest.duration_ms}ms` : "?ms";
    return `${level.toUpperCase()} ${method} ${p} -> ${status} (${duration})`;
  }

  const extras = Object.keys(rest)
    .sort()
    .map((k) => formatKeyValue(k, rest[k]))
    .filter(Boolean)
    .join(" ");
  return `${level.toUpperCase()} ${msg}${extras ? ` ${extras}` : ""}`;
}

export function log(entry: LogEntry) {
  if (!shouldLog(entry.level)) return;
  const line = wantsPrettyOutput() ? toPrettyLine(entry) : JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function buildRequestLog(input: {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
  request_id?: string;
}): LogEntry {
  return {
    level: input.status >= 500 ? "error" : "info",
    msg: "request",
    method: input.method,
    path: input.path,
    status: input.status,
    duration_ms: input.duration_ms,
    request_id: input.request_id
  };
}
