// Application layer: ScoringService
// The in-process call contract of the scoring engine

import {
  createScoresheet,
  DEFAULT_CATALOG,
  findCategory,
  isEligible,
  legalCategories,
  newRoll,
  scoreCategory,
  validateSelection,
  type Category,
  type CommitResult,
  type Roll,
  type RollInput,
  type RuleCatalog,
  type ScoreTotals,
  type Scoresheet,
  type Verdict,
} from '@/domain/index.js';
import { UnknownCategoryError } from '@/utils/errors.js';
import { Logger, scoringLogger } from '@/utils/logger.js';

export interface ScorePreview {
  categoryId: string;
  name: string;
  score: number;
  eligible: boolean;
}

export class ScoringService {
  constructor(
    readonly catalog: RuleCatalog = DEFAULT_CATALOG,
    private logger: Logger = scoringLogger
  ) {}

  /** @throws InvalidRollError */
  newRoll(faces: readonly unknown[]): Roll {
    return newRoll(faces);
  }

  categoryCatalog(): readonly Category[] {
    return this.catalog.categories;
  }

  createScoresheet(): Scoresheet {
    return createScoresheet(this.catalog);
  }

  private requireCategory(categoryId: string): Category {
    const category = findCategory(this.catalog, categoryId);
    if (!category) {
      throw new UnknownCategoryError(categoryId);
    }
    return category;
  }

  validate(sheet: Scoresheet, roll: RollInput, categoryId: string): Verdict {
    return validateSelection(this.catalog, sheet, roll, categoryId);
  }

  /**
   * Points for the category, independent of any scoresheet.
   * @throws UnknownCategoryError
   */
  score(roll: Roll, categoryId: string): number {
    return scoreCategory(this.requireCategory(categoryId), roll);
  }

  /** @throws UnknownCategoryError */
  isEligible(roll: Roll, categoryId: string): boolean {
    return isEligible(this.requireCategory(categoryId), roll);
  }

  /** Every category's score and eligibility for one roll. */
  preview(roll: Roll): ScorePreview[] {
    return this.catalog.categories.map((category) => ({
      categoryId: category.id,
      name: category.name,
      score: scoreCategory(category, roll),
      eligible: isEligible(category, roll),
    }));
  }

  legalCategories(sheet: Scoresheet, roll: Roll): Category[] {
    return legalCategories(this.catalog, sheet, roll);
  }

  commit(sheet: Scoresheet, roll: RollInput, categoryId: string): CommitResult {
    const result = sheet.commit(roll, categoryId);

    if (!result.ok) {
      this.logger.warn('Score rejected', { categoryId, reason: result.reason });
      return result;
    }

    this.logger.debug('Score committed', {
      categoryId,
      score: result.entry.score,
      joker: result.entry.joker,
      grandTotal: result.totals.grandTotal,
    });
    if (result.bonusAwarded) {
      this.logger.info('Bonus Yahtzee awarded', {
        bonusYahtzees: result.totals.bonusYahtzees,
        bonusTotal: result.totals.bonusTotal,
      });
    }

    return result;
  }

  totals(sheet: Scoresheet): ScoreTotals {
    return sheet.totals();
  }
}
