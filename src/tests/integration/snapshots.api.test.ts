import request from 'supertest';
import app from '@/app';

describe('Snapshots API', () => {
  describe('GET /api/v1/snapshots', () => {
    it('should return the fallback dataset in order', async () => {
      const response = await request(app)
        .get('/api/v1/snapshots')
        .query({ useLive: 'false' })
        .expect(200);

      expect(response.body.source).toBe('fallback');
      expect(response.body.count).toBe(10);
      expect(response.body.snapshots[0]).toEqual({
        code: '005930',
        name: '삼성전자',
        price: 71000,
        changePercent: 2.5,
        volume: 15000000,
        marketCap: 423000000,
      });
      expect(response.body.snapshots[9].code).toBe('005490');
      expect(Number.isNaN(Date.parse(response.body.fetchedAt))).toBe(false);
    });

    it('should fall back when live data is requested without credentials', async () => {
      const response = await request(app)
        .get('/api/v1/snapshots')
        .query({ useLive: 'true' })
        .expect(200);

      expect(response.body.source).toBe('fallback');
    });

    it('should reject an invalid useLive value', async () => {
      const response = await request(app)
        .get('/api/v1/snapshots')
        .query({ useLive: 'yes' })
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.message).toBe('Invalid query');
    });
  });

  describe('POST /api/v1/snapshots/refresh', () => {
    it('should clear cached batches', async () => {
      await request(app).get('/api/v1/snapshots').query({ useLive: 'false' }).expect(200);

      const response = await request(app).post('/api/v1/snapshots/refresh').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.cleared).toBeGreaterThanOrEqual(1);
    });

    it('should report zero when the cache is already empty', async () => {
      await request(app).post('/api/v1/snapshots/refresh').expect(200);

      const response = await request(app).post('/api/v1/snapshots/refresh').expect(200);

      expect(response.body).toEqual({ success: true, cleared: 0 });
    });
  });
});
