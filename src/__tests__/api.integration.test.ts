import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { NestingService } from '../services/nesting.service';

const square = (size: number) => [
  [0, 0],
  [size, 0],
  [size, size],
  [0, size]
];

const fast = { populationSize: 4, maxGenerations: 2, seed: 1 };

describe('API Integration Tests', () => {
  let app: Express;
  let nestingService: NestingService;

  beforeEach(() => {
    nestingService = new NestingService();
    app = createApp({ nestingService });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /api/health', () => {
    it('should report the API as running', async () => {
      const response = await request(app).get('/api/health').expect(200);

      expect(response.body).toEqual({ status: 'ok', message: 'Nesting API is running' });
    });
  });

  describe('POST /api/nesting/nest', () => {
    it('should nest parts on a sheet', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({
          parts: [{ id: 'sq', points: square(50), quantity: 4, rotations: [0] }],
          sheet: { width: 200, height: 100 },
          config: fast
        })
        .expect(200);

      expect(response.body.message).toBe('Placed 4 out of 4 part instances');
      expect(response.body.result.placements).toHaveLength(4);
      expect(response.body.result.utilization).toBe(0.5);
      expect(response.body.quantities).toEqual([{ partId: 'sq', requested: 4, placed: 4 }]);
    });

    it('should accept a container polygon and numeric ids', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({
          parts: [{ id: 7, polygon: { points: square(10).map(([x, y]) => ({ x, y })) } }],
          container: square(100),
          config: fast
        })
        .expect(200);

      expect(response.body.result.placements[0].partId).toBe('7');
      expect(response.body.result.placements[0].instanceId).toBe('7_1');
    });

    it('should reject degenerate geometry', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({
          parts: [{ id: 'line', points: [[0, 0], [10, 0]] }],
          sheet: { width: 100, height: 100 }
        })
        .expect(400);

      expect(response.body.error).toBe('GeometryError');
      expect(response.body.code).toBe('INVALID_GEOMETRY');
    });

    it('should reject invalid configuration with the offending field', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({
          parts: [{ id: 'sq', points: square(10) }],
          sheet: { width: 100, height: 100 },
          config: { populationSize: 0 }
        })
        .expect(400);

      expect(response.body).toMatchObject({ error: 'ConfigError', code: 'INVALID_CONFIG', field: 'populationSize' });
    });

    it('should reject an unknown rotation preset', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({
          parts: [{ id: 'sq', points: square(10) }],
          sheet: { width: 100, height: 100 },
          config: { rotationPreset: '7' }
        })
        .expect(400);

      expect(response.body.field).toBe('rotationPreset');
      expect(response.body.message).toBe('rotationPreset: unknown preset "7" (expected one of 90, 45, 15, 10, 5)');
    });

    it('should reject a request without parts', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .send({ sheet: { width: 100, height: 100 } })
        .expect(400);

      expect(response.body.field).toBe('parts');
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/nesting/nest')
        .set('Content-Type', 'application/json')
        .send('{"parts": [')
        .expect(400);

      expect(response.body.code).toBe('INVALID_JSON');
    });

    it('should return 500 for unexpected failures', async () => {
      jest.spyOn(nestingService, 'nest').mockRejectedValue(new Error('boom'));

      const response = await request(app)
        .post('/api/nesting/nest')
        .send({ parts: [{ id: 'sq', points: square(10) }], sheet: { width: 100, height: 100 } })
        .expect(500);

      expect(response.body).toEqual({ error: 'Internal server error', code: 'INTERNAL', message: 'boom' });
    });
  });

  describe('POST /api/nesting/multi-sheet', () => {
    it('should spread parts over several sheets', async () => {
      const response = await request(app)
        .post('/api/nesting/multi-sheet')
        .send({
          parts: [{ id: 'sq', points: square(50), quantity: 6, rotations: [0] }],
          sheet: { width: 100, height: 100 },
          maxSheets: 3,
          config: fast
        })
        .expect(200);

      expect(response.body.sheets).toHaveLength(2);
      expect(response.body.message).toBe('Placed 6 out of 6 part instances on 2 sheet(s)');
    });

    it('should require maxSheets', async () => {
      const response = await request(app)
        .post('/api/nesting/multi-sheet')
        .send({ parts: [{ id: 'sq', points: square(50) }], sheet: { width: 100, height: 100 } })
        .expect(400);

      expect(response.body.field).toBe('maxSheets');
    });
  });

  describe('POST /api/nesting/max-quantity', () => {
    it('should find the largest quantity that fits', async () => {
      const response = await request(app)
        .post('/api/nesting/max-quantity')
        .send({ part: square(50), sheetWidth: 100, sheetHeight: 100, units: 'in', config: fast })
        .expect(200);

      expect(response.body).toMatchObject({
        success: true,
        actualQuantity: 4,
        estimatedMax: 4,
        message: 'Nested 4 copies in a 100×100 in sheet'
      });
    });
  });

  describe('POST /api/nesting/sheet-report', () => {
    it('should rank sheet sizes', async () => {
      const response = await request(app)
        .post('/api/nesting/sheet-report')
        .send({
          part: square(50),
          sheetSizes: [
            { name: 'tall', width: 100, height: 120 },
            { name: 'square', width: 100, height: 100 }
          ],
          config: fast
        })
        .expect(200);

      expect(response.body.bestSheet).toBe('square');
      expect(response.body.results).toHaveLength(2);
    });

    it('should reject an empty size list', async () => {
      const response = await request(app)
        .post('/api/nesting/sheet-report')
        .send({ part: square(50), sheetSizes: [] })
        .expect(400);

      expect(response.body.field).toBe('sheetSizes');
    });
  });

  describe('POST /api/nesting/jobs', () => {
    it('should accept the job and run it in the background', async () => {
      const nestSpy = jest.spyOn(nestingService, 'nest');

      const response = await request(app)
        .post('/api/nesting/jobs')
        .send({
          parts: [{ id: 'sq', points: square(50), quantity: 2, rotations: [0] }],
          sheet: { width: 200, height: 100 },
          config: fast,
          socketId: 'client-1'
        })
        .expect(202);

      expect(response.body.jobId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(response.body.message).toBe('Nesting started. Listen for progress via Socket.IO.');
      expect(nestSpy).toHaveBeenCalledTimes(1);

      const report = await nestSpy.mock.results[0].value;
      expect(report.placedInstances).toBe(2);
    });

    it('should validate the job before accepting it', async () => {
      await request(app)
        .post('/api/nesting/jobs')
        .send({ parts: [{ id: 'sq', points: square(50) }] })
        .expect(400);
    });
  });
});
