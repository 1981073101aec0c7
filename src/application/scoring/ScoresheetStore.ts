// Application layer: In-memory scoresheet store
// Holds one scoresheet per id for the lifetime of the process

import type { Scoresheet } from '@/domain/scoring/scoresheet.js';

export interface StoredScoresheet {
  id: string;
  player?: string;
  sheet: Scoresheet;
  createdAt: Date;
}

export class ScoresheetStore {
  private sheets = new Map<string, StoredScoresheet>();

  add(id: string, sheet: Scoresheet, player?: string): StoredScoresheet {
    const stored: StoredScoresheet = { id, player, sheet, createdAt: new Date() };
    this.sheets.set(id, stored);
    return stored;
  }

  get(id: string): StoredScoresheet | undefined {
    return this.sheets.get(id);
  }

  has(id: string): boolean {
    return this.sheets.has(id);
  }

  delete(id: string): boolean {
    return this.sheets.delete(id);
  }

  list(): StoredScoresheet[] {
    return [...this.sheets.values()];
  }

  get size(): number {
    return this.sheets.size;
  }
}
