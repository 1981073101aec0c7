// Domain layer: Die/Roll model
// Pure TypeScript, the only dependency is the shared error type

import { InvalidRollError } from '@/utils/errors.js';

export type DieFace = 1 | 2 | 3 | 4 | 5 | 6;

export const DICE_PER_ROLL = 5;
export const DIE_FACES: readonly DieFace[] = [1, 2, 3, 4, 5, 6];

/** Count of dice showing each face, indexed by face value (index 0 unused). */
export type Histogram = readonly [0, number, number, number, number, number, number];

export function isDieFace(value: unknown): value is DieFace {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 6;
}

/**
 * Immutable snapshot of five die faces.
 * Order-insensitive for scoring: equality and `key` use the sorted multiset.
 */
export class Roll {
  readonly faces: readonly DieFace[];
  readonly sorted: readonly DieFace[];
  readonly histogram: Histogram;
  readonly sum: number;
  readonly key: string;

  private constructor(faces: DieFace[]) {
    const counts: [0, number, number, number, number, number, number] = [0, 0, 0, 0, 0, 0, 0];
    for (const face of faces) {
      counts[face]++;
    }

    this.faces = Object.freeze([...faces]);
    this.sorted = Object.freeze([...faces].sort((a, b) => a - b));
    this.histogram = Object.freeze(counts);
    this.sum = faces.reduce((total, face) => total + face, 0);
    this.key = this.sorted.join(',');
    Object.freeze(this);
  }

  static from(values: readonly unknown[]): Roll {
    if (values.length !== DICE_PER_ROLL) {
      throw new InvalidRollError(
        `A roll must have exactly ${DICE_PER_ROLL} dice, got ${values.length}`,
        { count: values.length }
      );
    }

    const faces: DieFace[] = [];
    for (const value of values) {
      if (!isDieFace(value)) {
        throw new InvalidRollError(`Die face ${String(value)} is not in 1-6`, { faces: [...values] });
      }
      faces.push(value);
    }

    return new Roll(faces);
  }

  count(face: DieFace): number {
    return this.histogram[face];
  }

  /** Highest number of dice sharing a face. */
  get maxOfAKind(): number {
    return Math.max(...this.histogram);
  }

  get isYahtzee(): boolean {
    return this.maxOfAKind === DICE_PER_ROLL;
  }

  equals(other: Roll): boolean {
    return this.key === other.key;
  }

  toJSON(): DieFace[] {
    return [...this.faces];
  }

  toString(): string {
    return `[${this.faces.join(', ')}]`;
  }
}

export function newRoll(faces: readonly unknown[]): Roll {
  return Roll.from(faces);
}
