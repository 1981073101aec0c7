// Domain layer: Dice pattern predicates
// All checks read the roll's histogram, never the dice order

import type { DieFace, Roll } from '@/domain/dice/roll.js';

const SMALL_STRAIGHTS: readonly (readonly DieFace[])[] = [
  [1, 2, 3, 4],
  [2, 3, 4, 5],
  [3, 4, 5, 6],
];

const LARGE_STRAIGHTS: readonly (readonly DieFace[])[] = [
  [1, 2, 3, 4, 5],
  [2, 3, 4, 5, 6],
];

function containsRun(roll: Roll, run: readonly DieFace[]): boolean {
  return run.every((face) => roll.count(face) > 0);
}

export function hasOfAKind(roll: Roll, n: number): boolean {
  return roll.maxOfAKind >= n;
}

/**
 * Exactly one face three times and another twice.
 * Five of a kind only counts when `acceptsFiveOfAKind` is set.
 */
export function isFullHouse(roll: Roll, acceptsFiveOfAKind = false): boolean {
  if (roll.isYahtzee) return acceptsFiveOfAKind;
  const counts = roll.histogram.filter((count) => count > 0);
  return counts.length === 2 && counts.includes(3) && counts.includes(2);
}

export function isSmallStraight(roll: Roll): boolean {
  return SMALL_STRAIGHTS.some((run) => containsRun(roll, run));
}

export function isLargeStraight(roll: Roll): boolean {
  return LARGE_STRAIGHTS.some((run) => containsRun(roll, run));
}

export function isYahtzee(roll: Roll): boolean {
  return roll.isYahtzee;
}
