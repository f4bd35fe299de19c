import type { Round } from './contracts';

// Extremes of the ECMAScript time value range.
export const MIN_TIME = -8.64e15;
export const MAX_TIME = 8.64e15;

/**
 * A round that is active at every instant and lets the caller choose task types.
 * Used when the round id is supplied directly and nothing is fetched.
 */
export function alwaysActiveRound(id: string): Round {
  return Object.freeze({
    id,
    start_timestamp: new Date(MIN_TIME),
    end_timestamp: new Date(MAX_TIME),
    can_choose_type: true,
  });
}

export function isRoundActive(round: Round, now: Date = new Date()): boolean {
  const t = now.getTime();
  return round.start_timestamp.getTime() <= t && t <= round.end_timestamp.getTime();
}

/** First round whose [start, end] interval contains `now`, bounds included. */
export function findCurrentRound(
  rounds: readonly Round[],
  now: Date = new Date(),
): Round | undefined {
  return rounds.find((round) => isRoundActive(round, now));
}
