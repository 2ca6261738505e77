export const draftStatuses = ["WAITING", "IN_PROGRESS", "PAUSED", "COMPLETED"] as const;
export type DraftStatus = (typeof draftStatuses)[number];

export type DraftStatusTransition = {
  from: DraftStatus;
  to: DraftStatus;
};

const allowedTransitions: DraftStatusTransition[] = [
  { from: "WAITING", to: "IN_PROGRESS" },
  { from: "WAITING", to: "COMPLETED" },
  { from: "IN_PROGRESS", to: "PAUSED" },
  { from: "PAUSED", to: "IN_PROGRESS" },
  { from: "IN_PROGRESS", to: "COMPLETED" },
  { from: "PAUSED", to: "COMPLETED" }
];

export type DraftStatusErrorCode = "UNKNOWN_STATUS" | "SAME_STATUS" | "TRANSITION_NOT_ALLOWED";

export class DraftStatusError extends Error {
  constructor(
    message: string,
    public code: DraftStatusErrorCode,
    public details?: { from?: string; to?: string }
  ) {
    super(message);
    this.name = "DraftStatusError";
  }
}

export function isValidDraftStatus(status: string): status is DraftStatus {
  return draftStatuses.some((candidate) => candidate === status);
}

export function validateDraftTransition(from: string, to: string) {
  if (!isValidDraftStatus(from)) {
    throw new DraftStatusError("Unknown from status", "UNKNOWN_STATUS", { from, to });
  }
  if (!isValidDraftStatus(to)) {
    throw new DraftStatusError("Unknown to status", "UNKNOWN_STATUS", { from, to });
  }
  if (from === to) {
    throw new DraftStatusError("No-op transition", "SAME_STATUS", { from, to });
  }

  const allowed = allowedTransitions.some((t) => t.from === from && t.to === to);
  if (!allowed) {
    throw new DraftStatusError("Transition not allowed", "TRANSITION_NOT_ALLOWED", {
      from,
      to
    });
  }
}

export function enforceDraftTransition(from: DraftStatus, to: DraftStatus): DraftStatus {
  validateDraftTransition(from, to);
  return to;
}
