// Domain layer: Scoresheet
// Per-player ledger of category scores; totals are derived on every query

import { Roll } from '@/domain/dice/roll.js';
import { categoriesInSection, findCategory } from './catalog.js';
import { scoreCategory, scoreJoker } from './category.js';
import { isBonusYahtzee, validateSelection, type RollInput, type ScoresheetView } from './validators.js';
import type { Category, Rejection, RuleCatalog, ScoreEntry, ScoreTotals, ScoresheetRow, Section } from './types.js';

export type CommitResult =
  | { ok: true; entry: ScoreEntry; bonusAwarded: boolean; totals: ScoreTotals }
  | Rejection;

/**
 * Scoresheet - one player's filled categories and bonus Yahtzee count.
 * Mutated only through `commit`; single writer assumed.
 */
export class Scoresheet implements ScoresheetView {
  private readonly entries = new Map<string, ScoreEntry>();
  private bonusCount = 0;

  constructor(readonly catalog: RuleCatalog) {}

  entry(categoryId: string): ScoreEntry | undefined {
    return this.entries.get(categoryId);
  }

  isFilled(categoryId: string): boolean {
    return this.entries.has(categoryId);
  }

  get bonusYahtzees(): number {
    return this.bonusCount;
  }

  /** Entries in catalog order. */
  listEntries(): ScoreEntry[] {
    const result: ScoreEntry[] = [];
    for (const category of this.catalog.categories) {
      const entry = this.entries.get(category.id);
      if (entry) result.push(entry);
    }
    return result;
  }

  openCategories(): Category[] {
    return this.catalog.categories.filter((category) => !this.entries.has(category.id));
  }

  isComplete(): boolean {
    return this.openCategories().length === 0;
  }

  /**
   * Validate and, if legal, record the score for `categoryId`.
   * A bonus Yahtzee is credited in the same step. Nothing changes on rejection.
   */
  commit(rollInput: RollInput, categoryId: string): CommitResult {
    const verdict = validateSelection(this.catalog, this, rollInput, categoryId);
    if (!verdict.ok) {
      return verdict;
    }

    // validateSelection already proved both of these
    const roll = rollInput instanceof Roll ? rollInput : Roll.from(rollInput);
    const category = findCategory(this.catalog, categoryId);
    if (!category) {
      return { ok: false, reason: 'UnknownCategory', message: `Unknown category: ${categoryId}` };
    }

    const bonusAwarded = isBonusYahtzee(this.catalog, this, roll);
    const score = verdict.joker ? scoreJoker(category, roll) : scoreCategory(category, roll);
    const entry: ScoreEntry = Object.freeze({ categoryId: category.id, score, joker: verdict.joker });

    this.entries.set(category.id, entry);
    if (bonusAwarded) {
      this.bonusCount++;
    }

    return { ok: true, entry, bonusAwarded, totals: this.totals() };
  }

  private sectionSubtotal(section: Section): number {
    return categoriesInSection(this.catalog, section).reduce(
      (sum, category) => sum + (this.entries.get(category.id)?.score ?? 0),
      0
    );
  }

  totals(): ScoreTotals {
    const upperSubtotal = this.sectionSubtotal('upper');
    const { threshold, points } = this.catalog.upperBonus;
    const upperBonus = upperSubtotal >= threshold ? points : 0;
    const lowerSubtotal = this.sectionSubtotal('lower');
    const bonusTotal = this.bonusCount * this.catalog.bonus.points;

    return {
      upperSubtotal,
      upperBonus,
      lowerSubtotal,
      bonusYahtzees: this.bonusCount,
      bonusTotal,
      grandTotal: upperSubtotal + upperBonus + lowerSubtotal + bonusTotal,
    };
  }

  /** Sheet laid out by section, upper first, in catalog order. */
  rows(): ScoresheetRow[] {
    const sections: Section[] = ['upper', 'lower'];
    return sections.flatMap((section) =>
      categoriesInSection(this.catalog, section).map((category) => ({
        section,
        categoryId: category.id,
        name: category.name,
        score: this.entries.get(category.id)?.score ?? null,
      }))
    );
  }
}

export function createScoresheet(catalog: RuleCatalog): Scoresheet {
  return new Scoresheet(catalog);
}
