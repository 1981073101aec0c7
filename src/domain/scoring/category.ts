// Domain layer: Category scoring
// One scoring function shared by every category kind

import type { Roll } from '@/domain/dice/roll.js';
import type { AnyCategory, PatternCategory } from './types.js';
import { hasOfAKind, isFullHouse, isLargeStraight, isSmallStraight, isYahtzee } from './patterns.js';

function patternHolds(category: PatternCategory, roll: Roll): boolean {
  switch (category.pattern) {
    case 'full_house':
      return isFullHouse(roll, category.acceptsFiveOfAKind ?? false);
    case 'small_straight':
      return isSmallStraight(roll);
    case 'large_straight':
      return isLargeStraight(roll);
    case 'yahtzee':
      return isYahtzee(roll);
  }
}

/**
 * Roll-shape prerequisite of a category.
 * Face categories and Chance accept any roll.
 */
export function isEligible(category: AnyCategory, roll: Roll): boolean {
  switch (category.kind) {
    case 'face':
      return true;
    case 'count':
      return hasOfAKind(roll, category.minOfAKind);
    case 'pattern':
      return patternHolds(category, roll);
    case 'bonus':
      return isYahtzee(roll);
  }
}

/**
 * Points the category awards for a roll, independent of any scoresheet.
 * Ineligible rolls score 0.
 */
export function scoreCategory(category: AnyCategory, roll: Roll): number {
  switch (category.kind) {
    case 'face':
      return roll.count(category.face) * category.face;
    case 'count':
      return isEligible(category, roll) ? roll.sum : 0;
    case 'pattern':
    case 'bonus':
      return isEligible(category, roll) ? category.points : 0;
  }
}

/**
 * Score under the joker rule: the roll stands in for any lower-section pattern,
 * so pattern categories award their full points. Upper categories keep their
 * face rule.
 */
export function scoreJoker(category: AnyCategory, roll: Roll): number {
  if (category.kind === 'pattern' && roll.isYahtzee) {
    return category.points;
  }
  return scoreCategory(category, roll);
}
