import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from './app.js';
import { ScoringService } from '@/application/scoring/ScoringService.js';
import { ScoresheetStore } from '@/application/scoring/ScoresheetStore.js';
import { createRuleCatalog } from '@/domain/scoring/catalog.js';

describe('scoring API', () => {
  let app: Application;
  let store: ScoresheetStore;

  beforeEach(() => {
    store = new ScoresheetStore();
    app = createApp({ logFormat: null, store });
  });

  async function createSheet(body: Record<string, unknown> = {}): Promise<string> {
    const res = await request(app).post('/api/scoresheets').send(body).expect(201);
    return res.body.sheetId;
  }

  it('reports health', async () => {
    const res = await request(app).get('/health').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.scoresheets).toBe(0);
  });

  it('lists the catalog', async () => {
    const res = await request(app).get('/api/categories').expect(200);

    expect(res.body.categories).toHaveLength(13);
    expect(res.body.categories[8]).toEqual({
      kind: 'pattern',
      id: 'full_house',
      name: 'Full House',
      section: 'lower',
      pattern: 'full_house',
      points: 25,
      acceptsFiveOfAKind: false,
    });
    expect(res.body.upperBonus).toEqual({ threshold: 63, points: 35 });
    expect(res.body.bonus.points).toBe(100);
    expect(res.body.options.jokerRule).toBe('standard');
  });

  describe('POST /api/scoring/score', () => {
    it('scores a category', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: [3, 3, 3, 3, 3], categoryId: 'yahtzee' })
        .expect(200);

      expect(res.body).toEqual({ success: true, categoryId: 'yahtzee', dice: [3, 3, 3, 3, 3], score: 50, eligible: true });
    });

    it('rejects an invalid roll', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: [0, 2, 3, 4, 5], categoryId: 'chance' })
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('INVALID_ROLL');
      expect(res.body.error.message).toBe('Die face 0 is not in 1-6');
    });

    it('rejects an unknown category', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: [1, 2, 3, 4, 5], categoryId: 'bingo' })
        .expect(404);

      expect(res.body.error).toEqual({
        code: 'UNKNOWN_CATEGORY',
        message: 'Unknown category: bingo',
        details: { categoryId: 'bingo' },
      });
    });

    it('rejects a malformed body', async () => {
      const res = await request(app).post('/api/scoring/score').send({ dice: 'lots' }).expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.message).toBe('Invalid request body');
    });

    it('rejects a body that is not JSON', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .set('Content-Type', 'application/json')
        .send('{"dice": [1, 2 3]}')
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('INVALID_JSON');
    });

    it('rejects an oversized body', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: [1, 2, 3, 4, 5], categoryId: 'x'.repeat(200 * 1024) })
        .expect(413);

      expect(res.body.error.code).toBe('PAYLOAD_TOO_LARGE');
    });

    it('caps the number of dice in a request', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: new Array(40000).fill(1), categoryId: 'chance' })
        .expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details).toEqual([
        { path: 'dice', message: 'Array must contain at most 20 element(s)' },
      ]);
    });

    it('reports a wrong dice count as an invalid roll', async () => {
      const res = await request(app)
        .post('/api/scoring/score')
        .send({ dice: [1, 2, 3, 4, 5, 6], categoryId: 'chance' })
        .expect(400);

      expect(res.body.error).toEqual({
        code: 'INVALID_ROLL',
        message: 'A roll must have exactly 5 dice, got 6',
        details: { count: 6 },
      });
    });
  });

  it('previews every category', async () => {
    const res = await request(app).post('/api/scoring/preview').send({ dice: [1, 2, 3, 4, 5] }).expect(200);

    expect(res.body.scores).toHaveLength(13);
    expect(res.body.scores[10]).toEqual({ categoryId: 'large_straight', name: 'Large Straight', score: 40, eligible: true });
  });

  describe('scoresheets', () => {
    it('creates and reads a scoresheet', async () => {
      const sheetId = await createSheet({ player: 'alice' });

      const res = await request(app).get(`/api/scoresheets/${sheetId}`).expect(200);

      expect(res.body.sheetId).toBe(sheetId);
      expect(res.body.player).toBe('alice');
      expect(res.body.complete).toBe(false);
      expect(res.body.rows).toHaveLength(13);
      expect(res.body.totals.grandTotal).toBe(0);
      expect(store.size).toBe(1);
    });

    it('uses the request id when given and refuses duplicates', async () => {
      const sheetId = await createSheet({ requestId: 'table-1' });
      expect(sheetId).toBe('table-1');

      const res = await request(app).post('/api/scoresheets').send({ requestId: 'table-1' }).expect(409);
      expect(res.body.error.code).toBe('SCORESHEET_EXISTS');
    });

    it('lists scoresheets', async () => {
      await createSheet({ requestId: 'one', player: 'alice' });
      await createSheet({ requestId: 'two' });

      const res = await request(app).get('/api/scoresheets').expect(200);

      expect(res.body.count).toBe(2);
      expect(res.body.scoresheets).toEqual([
        { sheetId: 'one', player: 'alice', grandTotal: 0 },
        { sheetId: 'two', player: null, grandTotal: 0 },
      ]);
    });

    it('returns 404 for a missing scoresheet', async () => {
      const res = await request(app).get('/api/scoresheets/missing').expect(404);
      expect(res.body.error.code).toBe('SCORESHEET_NOT_FOUND');
    });

    it('commits scores and applies the joker rule', async () => {
      const sheetId = await createSheet();

      await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [2, 2, 2, 2, 2], categoryId: 'yahtzee' })
        .expect(200);

      const restricted = await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [6, 6, 6, 6, 6], categoryId: 'chance' })
        .expect(409);
      expect(restricted.body.error).toEqual({
        code: 'JOKER_RESTRICTED',
        message: 'Joker rule: five 6s must be scored in Sixes',
        details: { categoryId: 'chance' },
      });

      const res = await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [6, 6, 6, 6, 6], categoryId: 'sixes' })
        .expect(200);

      expect(res.body).toEqual({
        success: true,
        entry: { categoryId: 'sixes', score: 30, joker: true },
        bonusAwarded: true,
        totals: {
          upperSubtotal: 30,
          upperBonus: 0,
          lowerSubtotal: 50,
          bonusYahtzees: 1,
          bonusTotal: 100,
          grandTotal: 180,
        },
        complete: false,
      });
    });

    it('refuses to fill a category twice', async () => {
      const sheetId = await createSheet();
      await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [1, 2, 3, 4, 6], categoryId: 'chance' })
        .expect(200);

      const res = await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [6, 6, 5, 5, 4], categoryId: 'chance' })
        .expect(409);

      expect(res.body.error.code).toBe('ALREADY_FILLED');
    });

    it('reports a rejected commit with invalid dice as INVALID_ROLL', async () => {
      const sheetId = await createSheet();
      const res = await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [1, 2, 3, 4, 5, 6], categoryId: 'chance' })
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_ROLL');
    });

    it('validates without committing', async () => {
      const sheetId = await createSheet();

      const res = await request(app)
        .post(`/api/scoresheets/${sheetId}/validate`)
        .send({ dice: [1, 2, 3], categoryId: 'chance' })
        .expect(200);

      expect(res.body.verdict).toEqual({
        ok: false,
        reason: 'RollInvalid',
        message: 'A roll must have exactly 5 dice, got 3',
      });
      expect(store.get(sheetId)?.sheet.listEntries()).toEqual([]);
    });

    it('lists legal categories', async () => {
      const sheetId = await createSheet();
      await request(app)
        .post(`/api/scoresheets/${sheetId}/commit`)
        .send({ dice: [5, 5, 5, 5, 5], categoryId: 'yahtzee' })
        .expect(200);

      const res = await request(app)
        .post(`/api/scoresheets/${sheetId}/legal`)
        .send({ dice: [5, 5, 5, 5, 5] })
        .expect(200);

      expect(res.body.categories).toEqual(['fives']);
    });

    it('deletes a scoresheet', async () => {
      const sheetId = await createSheet();

      await request(app).delete(`/api/scoresheets/${sheetId}`).expect(200);
      await request(app).delete(`/api/scoresheets/${sheetId}`).expect(404);
      expect(store.size).toBe(0);
    });
  });

  it('uses the injected scoring service', async () => {
    const scoringService = new ScoringService(createRuleCatalog({ fullHouseAcceptsYahtzee: true }));
    const custom = createApp({ logFormat: null, scoringService });

    const res = await request(custom)
      .post('/api/scoring/score')
      .send({ dice: [2, 2, 2, 2, 2], categoryId: 'full_house' })
      .expect(200);

    expect(res.body.score).toBe(25);
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/nothing').expect(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});
