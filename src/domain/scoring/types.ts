// Domain layer: Scoring types
// NO external dependencies - pure TypeScript

import type { DieFace } from '@/domain/dice/roll.js';

export type Section = 'upper' | 'lower';

export type CategoryId =
  | 'ones'
  | 'twos'
  | 'threes'
  | 'fours'
  | 'fives'
  | 'sixes'
  | 'three_of_a_kind'
  | 'four_of_a_kind'
  | 'full_house'
  | 'small_straight'
  | 'large_straight'
  | 'yahtzee'
  | 'chance';

export type PatternName = 'full_house' | 'small_straight' | 'large_straight' | 'yahtzee';

interface CategoryBase {
  id: string;
  name: string;
  section: Section;
}

/** Ones..Sixes: sum of the dice showing `face`. */
export interface FaceCategory extends CategoryBase {
  kind: 'face';
  section: 'upper';
  face: DieFace;
}

/** Three/Four-of-a-Kind and Chance: sum of all dice once `minOfAKind` is met. */
export interface CountCategory extends CategoryBase {
  kind: 'count';
  minOfAKind: number;
}

/** Full House, straights, Yahtzee: constant points when the pattern holds. */
export interface PatternCategory extends CategoryBase {
  kind: 'pattern';
  pattern: PatternName;
  points: number;
  /** Full House only: whether five of a kind counts as a full house. */
  acceptsFiveOfAKind?: boolean;
}

/** Yahtzee bonus: flat points per extra Yahtzee. Never a scoresheet entry. */
export interface BonusCategory extends CategoryBase {
  kind: 'bonus';
  points: number;
}

export type Category = FaceCategory | CountCategory | PatternCategory;
export type AnyCategory = Category | BonusCategory;

/**
 * Joker rule variants
 * - standard: matching upper box first, then any lower box, then an upper box at zero
 * - free_choice: any open box, lower boxes use joker scoring
 * - none: bonus is still credited but no substitution or joker scoring
 */
export type JokerRule = 'standard' | 'free_choice' | 'none';

export interface PointValues {
  fullHouse: number;
  smallStraight: number;
  largeStraight: number;
  yahtzee: number;
  yahtzeeBonus: number;
  upperBonus: number;
  upperBonusThreshold: number;
}

export interface RuleOptions {
  jokerRule: JokerRule;
  fullHouseAcceptsYahtzee: boolean;
  points: PointValues;
}

export interface UpperBonus {
  threshold: number;
  points: number;
}

export interface RuleCatalog {
  readonly categories: readonly Category[];
  readonly bonus: BonusCategory;
  readonly upperBonus: UpperBonus;
  readonly options: RuleOptions;
}

export interface ScoreEntry {
  readonly categoryId: string;
  readonly score: number;
  /** True when the entry was scored under the joker rule. */
  readonly joker: boolean;
}

export type RejectionReason = 'RollInvalid' | 'UnknownCategory' | 'AlreadyFilled' | 'JokerRestricted';

export type Verdict =
  | { ok: true; joker: boolean }
  | { ok: false; reason: RejectionReason; message: string };

export type Rejection = Extract<Verdict, { ok: false }>;

export interface ScoreTotals {
  upperSubtotal: number;
  upperBonus: number;
  lowerSubtotal: number;
  bonusYahtzees: number;
  bonusTotal: number;
  grandTotal: number;
}

export interface ScoresheetRow {
  section: Section;
  categoryId: string;
  name: string;
  score: number | null;
}
