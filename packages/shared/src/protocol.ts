/**
 * Decoder for the draft room's text protocol. One frame carries one command:
 *
 *   SELECTED  <teamId> <playerId> <pickSeq> [<memberId>]
 *   SELECTING <teamId> <timeLimitMs>
 *   CLOCK     <teamId> <timeRemainingMs> [<round>]
 *   AUTODRAFT <teamId> <true|false>
 *   TOKEN | JOINED | LEFT | PING | PONG <anything>
 */

const sessionCommands = ["TOKEN", "JOINED", "LEFT", "PING", "PONG"] as const;
export type SessionCommand = (typeof sessionCommands)[number];

export type SelectedEvent = {
  type: "SELECTED";
  teamId: number;
  playerId: string;
  // Treated as the overall pick number.
  pickSeq: number;
  memberId: string | null;
  raw: string;
};

export type SelectingEvent = {
  type: "SELECTING";
  teamId: number;
  timeLimitMs: number;
  raw: string;
};

export type ClockEvent = {
  type: "CLOCK";
  teamId: number;
  timeRemainingMs: number;
  round: number | null;
  raw: string;
};

export type AutodraftEvent = {
  type: "AUTODRAFT";
  teamId: number;
  enabled: boolean;
  raw: string;
};

export type SessionEvent = {
  type: SessionCommand;
  args: string[];
  raw: string;
};

export type UnknownEvent = {
  type: "UNKNOWN";
  raw: string;
};

export type DraftEvent =
  | SelectedEvent
  | SelectingEvent
  | ClockEvent
  | AutodraftEvent
  | SessionEvent
  | UnknownEvent;

export type DraftEventType = DraftEvent["type"];

export type ProtocolParseErrorCode = "ARITY" | "NOT_AN_INTEGER" | "NOT_A_BOOLEAN";

export class ProtocolParseError extends Error {
  constructor(
    message: string,
    public code: ProtocolParseErrorCode,
    public details: { command: string; field?: string; value?: string; raw: string }
  ) {
    super(message);
    this.name = "ProtocolParseError";
  }
}

const INTEGER = /^-?\d+$/;

function isSessionCommand(command: string): command is SessionCommand {
  return sessionCommands.some((candidate) => candidate === command);
}

function expectArity(command: string, parts: string[], min: number, max: number, raw: string) {
  if (parts.length < min || parts.length > max) {
    const expected = min === max ? `${min}` : `${min}-${max}`;
    throw new ProtocolParseError(
      `${command} expects ${expected} tokens, received ${parts.length}`,
      "ARITY",
      { command, raw }
    );
  }
}

function toInt(command: string, field: string, value: string, raw: string): number {
  if (!INTEGER.test(value)) {
    throw new ProtocolParseError(`${command} ${field} must be an integer`, "NOT_AN_INTEGER", {
      command,
      field,
      value,
      raw
    });
  }
  return Number(value);
}

function toBool(command: string, field: string, value: string, raw: string): boolean {
  const normalized = value.toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw new ProtocolParseError(`${command} ${field} must be true or false`, "NOT_A_BOOLEAN", {
    command,
    field,
    value,
    raw
  });
}

export function parseFrame(raw: string): DraftEvent {
  const parts = raw.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return { type: "UNKNOWN", raw };

  const command = parts[0].toUpperCase();
  switch (command) {
    case "SELECTED": {
      expectArity(command, parts, 4, 5, raw);
      return {
        type: "SELECTED",
        teamId: toInt(command, "teamId", parts[1], raw),
        playerId: parts[2],
        pickSeq: toInt(command, "pickSeq", parts[3], raw),
        memberId: parts[4] ?? null,
        raw
      };
    }
    case "SELECTING": {
      expectArity(command, parts, 3, 3, raw);
      return {
        type: "SELECTING",
        teamId: toInt(command, "teamId", parts[1], raw),
        timeLimitMs: toInt(command, "timeLimitMs", parts[2], raw),
        raw
      };
    }
    case "CLOCK": {
      expectArity(command, parts, 3, 4, raw);
      return {
        type: "CLOCK",
        teamId: toInt(command, "teamId", parts[1], raw),
        timeRemainingMs: toInt(command, "timeRemainingMs", parts[2], raw),
        round: parts[3] === undefined ? null : toInt(command, "round", parts[3], raw),
        raw
      };
    }
    case "AUTODRAFT": {
      expectArity(command, parts, 3, 3, raw);
      return {
        type: "AUTODRAFT",
        teamId: toInt(command, "teamId", parts[1], raw),
        enabled: toBool(command, "enabled", parts[2], raw),
        raw
      };
    }
    default:
      if (isSessionCommand(command)) {
        return { type: command, args: parts.slice(1), raw };
      }
      return { type: "UNKNOWN", raw };
  }
}

/** Overall pick number a frame reports, or null for frames that carry none or do not parse. */
export function pickNumberOf(raw: string): number | null {
  let event: DraftEvent;
  try {
    event = parseFrame(raw);
  } catch (err) {
    if (err instanceof ProtocolParseError) return null;
    throw err;
  }
  return event.type === "SELECTED" ? event.pickSeq : null;
}
