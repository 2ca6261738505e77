function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
}

export function getSnakeSeatForPick(seatCount: number, pickNumber: number): number {
  assertPositiveInteger("seatCount", seatCount);
  assertPositiveInteger("pickNumber", pickNumber);

  const roundIndex = Math.floor((pickNumber - 1) / seatCount); // 0-based round
  const indexInRound = (pickNumber - 1) % seatCount; // 0-based position within round

  const forward = roundIndex % 2 === 0;
  if (forward) {
    return indexInRound + 1; // seats are 1-based
  }
  return seatCount - indexInRound;
}

/**
 * Overall pick numbers owned by the team sitting at `myIndex` (0-based) in a
 * snake draft, in the order they come up.
 */
export function computeSnakePickNumbers(
  teamCount: number,
  rounds: number,
  myIndex: number
): number[] {
  assertPositiveInteger("teamCount", teamCount);
  assertPositiveInteger("rounds", rounds);
  if (!Number.isInteger(myIndex) || myIndex < 0 || myIndex >= teamCount) {
    throw new Error("myIndex must be an integer in [0, teamCount)");
  }

  const picks: number[] = [];
  for (let round = 0; round < rounds; round += 1) {
    const base = round * teamCount;
    picks.push(round % 2 === 0 ? base + myIndex + 1 : base + (teamCount - myIndex));
  }
  return picks;
}

export function picksUntilNext(pickNumbers: readonly number[], currentPick: number): number {
  let next: number | null = null;
  for (const pick of pickNumbers) {
    if (pick > currentPick && (next === null || pick < next)) next = pick;
  }
  return next === null ? 0 : next - currentPick;
}
