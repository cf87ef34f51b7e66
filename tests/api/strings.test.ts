import request from 'supertest';
import app from '../../src/app';
import { compareStrings } from '../../src/controllers/stringController';

describe('String API', () => {
  describe('compareStrings', () => {
    it('should report every metric between the normalized strings', () => {
      const result = compareStrings({ left: 'Musee Grevin', right: 'Musée Grévin Paris', lcs: true });

      expect(result.normalizedLeft).toBe('musee grevin');
      expect(result.normalizedRight).toBe('musee grevin paris');
      expect(result.similarity).toBe(1);
      expect(result.levenshtein).toEqual({ distance: 6, ratio: 0.8 });
      expect(result.matchRating).toBe(true);
    });
  });

  describe('POST /api/v1/strings/compare', () => {
    it('should compare two strings', async () => {
      const response = await request(app)
        .post('/api/v1/strings/compare')
        .set('X-API-Key', 'dev-key-1')
        .send({ left: 'Musee Grevin', right: 'Musée Grévin Paris' });

      expect(response.status).toBe(200);
      expect(response.body.data.similarity).toBe(0.8);
    });

    it('should reject non-string operands', async () => {
      const response = await request(app)
        .post('/api/v1/strings/compare')
        .set('X-API-Key', 'dev-key-1')
        .send({ left: 'Paris', right: 75 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('INVALID_STRINGS');
    });

    it('should reject a non-boolean lcs flag', async () => {
      const response = await request(app)
        .post('/api/v1/strings/compare')
        .set('X-API-Key', 'dev-key-1')
        .send({ left: 'Paris', right: 'Lyon', lcs: 'yes' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('INVALID_LCS');
    });
  });
});
