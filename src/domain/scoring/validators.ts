// Domain layer: Selection validators
// Pure decision functions, re-evaluated on every attempt

import { Roll } from '@/domain/dice/roll.js';
import { InvalidRollError } from '@/utils/errors.js';
import { categoriesInSection, findCategory, upperCategoryForFace } from './catalog.js';
import type { Category, PatternCategory, RejectionReason, RuleCatalog, ScoreEntry, Verdict } from './types.js';

/** Read-only view of a scoresheet, enough to decide legality. */
export interface ScoresheetView {
  entry(categoryId: string): ScoreEntry | undefined;
}

export type RollInput = Roll | readonly unknown[];

function reject(reason: RejectionReason, message: string): Verdict {
  return { ok: false, reason, message };
}

export function yahtzeeCategory(catalog: RuleCatalog): PatternCategory | undefined {
  for (const category of catalog.categories) {
    if (category.kind === 'pattern' && category.pattern === 'yahtzee') return category;
  }
  return undefined;
}

/**
 * A five-of-a-kind rolled after the Yahtzee box was filled with a positive score.
 * A zeroed Yahtzee box never earns a bonus.
 */
export function isBonusYahtzee(catalog: RuleCatalog, sheet: ScoresheetView, roll: Roll): boolean {
  if (!roll.isYahtzee) return false;
  const yahtzee = yahtzeeCategory(catalog);
  if (!yahtzee) return false;
  const entry = sheet.entry(yahtzee.id);
  return entry !== undefined && entry.score > 0;
}

function validateJoker(catalog: RuleCatalog, sheet: ScoresheetView, roll: Roll, category: Category): Verdict {
  const isOpen = (candidate: Category) => sheet.entry(candidate.id) === undefined;

  if (!isOpen(category)) {
    return reject('JokerRestricted', `Joker rule: ${category.name} is already filled, choose an open category`);
  }

  if (catalog.options.jokerRule === 'free_choice') {
    return { ok: true, joker: true };
  }

  const face = roll.faces[0];
  const upper = upperCategoryForFace(catalog, face);
  if (upper && isOpen(upper)) {
    return category.id === upper.id
      ? { ok: true, joker: true }
      : reject('JokerRestricted', `Joker rule: five ${face}s must be scored in ${upper.name}`);
  }

  if (category.section === 'lower') {
    return { ok: true, joker: true };
  }

  if (categoriesInSection(catalog, 'lower').some(isOpen)) {
    return reject('JokerRestricted', 'Joker rule: an open lower-section category must be used first');
  }

  return { ok: true, joker: true };
}

/**
 * Decide whether `categoryId` may be scored now with `rollInput`.
 */
export function validateSelection(
  catalog: RuleCatalog,
  sheet: ScoresheetView,
  rollInput: RollInput,
  categoryId: string
): Verdict {
  let roll: Roll;
  try {
    roll = rollInput instanceof Roll ? rollInput : Roll.from(rollInput);
  } catch (error) {
    if (error instanceof InvalidRollError) {
      return reject('RollInvalid', error.message);
    }
    throw error;
  }

  const category = findCategory(catalog, categoryId);
  if (!category) {
    return reject('UnknownCategory', `Unknown category: ${categoryId}`);
  }

  if (catalog.options.jokerRule !== 'none' && isBonusYahtzee(catalog, sheet, roll)) {
    return validateJoker(catalog, sheet, roll, category);
  }

  if (sheet.entry(category.id) !== undefined) {
    return reject('AlreadyFilled', `${category.name} has already been scored`);
  }

  return { ok: true, joker: false };
}

/** Categories that may legally be scored with this roll, in catalog order. */
export function legalCategories(catalog: RuleCatalog, sheet: ScoresheetView, roll: Roll): Category[] {
  return catalog.categories.filter((category) => validateSelection(catalog, sheet, roll, category.id).ok);
}
