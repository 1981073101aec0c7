// Domain layer: Rule catalog
// Builds the frozen catalog of categories that validators and scoresheets share

import { DICE_PER_ROLL, DIE_FACES, type DieFace } from '@/domain/dice/roll.js';
import { DuplicateCategoryError, InvalidRuleError } from '@/utils/errors.js';
import type {
  BonusCategory,
  Category,
  CategoryId,
  FaceCategory,
  PointValues,
  RuleCatalog,
  RuleOptions,
  Section,
} from './types.js';

export const DEFAULT_POINTS: Readonly<PointValues> = Object.freeze({
  fullHouse: 25,
  smallStraight: 30,
  largeStraight: 40,
  yahtzee: 50,
  yahtzeeBonus: 100,
  upperBonus: 35,
  upperBonusThreshold: 63,
});

export const DEFAULT_RULE_OPTIONS: Readonly<RuleOptions> = Object.freeze({
  jokerRule: 'standard',
  fullHouseAcceptsYahtzee: false,
  points: DEFAULT_POINTS,
});

export const YAHTZEE_CATEGORY_ID: CategoryId = 'yahtzee';
export const YAHTZEE_BONUS_ID = 'yahtzee_bonus';

const FACE_CATEGORIES: readonly { id: CategoryId; name: string }[] = [
  { id: 'ones', name: 'Aces (Ones)' },
  { id: 'twos', name: 'Twos' },
  { id: 'threes', name: 'Threes' },
  { id: 'fours', name: 'Fours' },
  { id: 'fives', name: 'Fives' },
  { id: 'sixes', name: 'Sixes' },
];

export type RuleOptionsInput = Partial<Omit<RuleOptions, 'points'>> & {
  points?: Partial<PointValues>;
};

export function resolveRuleOptions(input: RuleOptionsInput = {}): RuleOptions {
  return {
    jokerRule: input.jokerRule ?? DEFAULT_RULE_OPTIONS.jokerRule,
    fullHouseAcceptsYahtzee: input.fullHouseAcceptsYahtzee ?? DEFAULT_RULE_OPTIONS.fullHouseAcceptsYahtzee,
    points: { ...DEFAULT_POINTS, ...input.points },
  };
}

/**
 * The thirteen standard categories, upper section first.
 */
export function buildDefaultCategories(options: RuleOptions): Category[] {
  const { points } = options;

  const upper: Category[] = FACE_CATEGORIES.map(({ id, name }, index): FaceCategory => ({
    kind: 'face',
    id,
    name,
    section: 'upper',
    face: DIE_FACES[index],
  }));

  const lower: Category[] = [
    { kind: 'count', id: 'three_of_a_kind', name: 'Three of a Kind', section: 'lower', minOfAKind: 3 },
    { kind: 'count', id: 'four_of_a_kind', name: 'Four of a Kind', section: 'lower', minOfAKind: 4 },
    {
      kind: 'pattern',
      id: 'full_house',
      name: 'Full House',
      section: 'lower',
      pattern: 'full_house',
      points: points.fullHouse,
      acceptsFiveOfAKind: options.fullHouseAcceptsYahtzee,
    },
    {
      kind: 'pattern',
      id: 'small_straight',
      name: 'Small Straight',
      section: 'lower',
      pattern: 'small_straight',
      points: points.smallStraight,
    },
    {
      kind: 'pattern',
      id: 'large_straight',
      name: 'Large Straight',
      section: 'lower',
      pattern: 'large_straight',
      points: points.largeStraight,
    },
    { kind: 'pattern', id: YAHTZEE_CATEGORY_ID, name: 'Yahtzee', section: 'lower', pattern: 'yahtzee', points: points.yahtzee },
    { kind: 'count', id: 'chance', name: 'Chance', section: 'lower', minOfAKind: 1 },
  ];

  return [...upper, ...lower];
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

const POINT_KEYS: readonly (keyof PointValues)[] = [
  'fullHouse',
  'smallStraight',
  'largeStraight',
  'yahtzee',
  'yahtzeeBonus',
  'upperBonus',
  'upperBonusThreshold',
];

function isPointValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function checkRuleValues(categories: Category[], options: RuleOptions): void {
  for (const key of POINT_KEYS) {
    const value = options.points[key];
    if (!isPointValue(value)) {
      throw new InvalidRuleError(`Point value ${key} must be a non-negative integer, got ${value}`, {
        key,
        value,
      });
    }
  }

  for (const category of categories) {
    if (category.kind === 'pattern' && !isPointValue(category.points)) {
      throw new InvalidRuleError(
        `${category.name} points must be a non-negative integer, got ${category.points}`,
        { categoryId: category.id, points: category.points }
      );
    }
    if (
      category.kind === 'count' &&
      !(Number.isInteger(category.minOfAKind) && category.minOfAKind >= 1 && category.minOfAKind <= DICE_PER_ROLL)
    ) {
      throw new InvalidRuleError(
        `${category.name} needs between 1 and ${DICE_PER_ROLL} of a kind, got ${category.minOfAKind}`,
        { categoryId: category.id, minOfAKind: category.minOfAKind }
      );
    }
  }
}

export interface CatalogDefinition {
  categories: Category[];
  options: RuleOptions;
}

/**
 * Freeze a set of categories into a catalog.
 * @throws DuplicateCategoryError when two categories (or the bonus) share an id
 * @throws InvalidRuleError when a point value or of-a-kind count is out of range
 */
export function createCatalog({ categories, options }: CatalogDefinition): RuleCatalog {
  const bonus: BonusCategory = {
    kind: 'bonus',
    id: YAHTZEE_BONUS_ID,
    name: 'Yahtzee Bonus',
    section: 'lower',
    points: options.points.yahtzeeBonus,
  };

  const duplicates = findDuplicates([...categories.map((category) => category.id), bonus.id]);
  if (duplicates.length > 0) {
    throw new DuplicateCategoryError(duplicates);
  }
  checkRuleValues(categories, options);

  return Object.freeze({
    categories: Object.freeze(categories.map((category) => Object.freeze({ ...category }))),
    bonus: Object.freeze(bonus),
    upperBonus: Object.freeze({
      threshold: options.points.upperBonusThreshold,
      points: options.points.upperBonus,
    }),
    options: Object.freeze({ ...options, points: Object.freeze({ ...options.points }) }),
  });
}

export function createRuleCatalog(input: RuleOptionsInput = {}): RuleCatalog {
  const options = resolveRuleOptions(input);
  return createCatalog({ categories: buildDefaultCategories(options), options });
}

export const DEFAULT_CATALOG: RuleCatalog = createRuleCatalog();

export function findCategory(catalog: RuleCatalog, categoryId: string): Category | undefined {
  return catalog.categories.find((category) => category.id === categoryId);
}

export function categoriesInSection(catalog: RuleCatalog, section: Section): Category[] {
  return catalog.categories.filter((category) => category.section === section);
}

/** Upper category scoring the given face, e.g. five 4s -> Fours. */
export function upperCategoryForFace(catalog: RuleCatalog, face: DieFace): FaceCategory | undefined {
  for (const category of catalog.categories) {
    if (category.kind === 'face' && category.face === face) return category;
  }
  return undefined;
}
