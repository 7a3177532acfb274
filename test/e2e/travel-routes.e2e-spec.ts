import { INestApplication } from '@nestjs/common';
import { Types } from 'mongoose';
import request from 'supertest';
import { TravelRoutesController } from '../../src/travel-routes/travel-routes.controller';
import { TravelRoutesService } from '../../src/travel-routes/travel-routes.service';
import { createTestApp } from '../utils/e2e-app';

describe('Travel routes (e2e)', () => {
  let app: INestApplication;
  let token: string;
  const travelRoutesService = {
    calculate: jest.fn(),
    calculateAllModes: jest.fn(),
    recommend: jest.fn(),
    optimizeDaily: jest.fn(),
    optimizeMultiDay: jest.fn(),
  };
  const origin = { lat: 37.5665, lon: 126.978 };
  const destination = { lat: 37.57, lon: 126.978 };

  beforeAll(async () => {
    const testApp = await createTestApp({
      controllers: [TravelRoutesController],
      providers: [{ provide: TravelRoutesService, useValue: travelRoutesService }],
    });
    app = testApp.app;
    token = testApp.signToken({ userId: new Types.ObjectId().toString(), email: 'user@example.com', role: 'USER' });
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.resetAllMocks();
  });

  describe('POST /api/v1/routes/calculate', () => {
    it('answers 422 when the destination is missing', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/routes/calculate')
        .set('Authorization', `Bearer ${token}`)
        .send({ origin })
        .expect(422);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details).toEqual(
        expect.arrayContaining([{ field: 'destination', message: 'destination should not be null or undefined' }]),
      );
      expect(travelRoutesService.calculate).not.toHaveBeenCalled();
    });
  });

  it('POST /api/v1/routes/calculate/multiple returns every mode', async () => {
    travelRoutesService.calculateAllModes.mockResolvedValue({ walking: { mode: 'walking' } });

    const response = await request(app.getHttpServer())
      .post('/api/v1/routes/calculate/multiple')
      .set('Authorization', `Bearer ${token}`)
      .send({ origin, destination })
      .expect(200);

    expect(travelRoutesService.calculateAllModes).toHaveBeenCalledWith(origin, destination);
    expect(response.body.data).toEqual({ walking: { mode: 'walking' } });
  });

  it('POST /api/v1/routes/recommend passes the preferences through', async () => {
    travelRoutesService.recommend.mockResolvedValue({ reason: '빠른 이동을 위한 자동차 추천' });

    await request(app.getHttpServer())
      .post('/api/v1/routes/recommend')
      .set('Authorization', `Bearer ${token}`)
      .send({ origin, destination, preferences: { prefer_speed: true } })
      .expect(200);

    expect(travelRoutesService.recommend).toHaveBeenCalledWith(origin, destination, { prefer_speed: true });
  });

  describe('POST /api/v1/routes/optimize-daily', () => {
    it('hands the places and options to the optimizer', async () => {
      travelRoutesService.optimizeDaily.mockReturnValue({ day: 1 });
      const places = [{ id: 'p1', name: '경복궁', lat: 37.5796, lon: 126.977 }];

      const response = await request(app.getHttpServer())
        .post('/api/v1/routes/optimize-daily')
        .set('Authorization', `Bearer ${token}`)
        .send({ places, start: origin, start_time: '10:00' })
        .expect(200);

      expect(travelRoutesService.optimizeDaily).toHaveBeenCalledWith(places, {
        start: origin,
        startTime: '10:00',
        mode: undefined,
      });
      expect(response.body.data).toEqual({ day: 1 });
    });

    it('refuses a malformed start time', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/routes/optimize-daily')
        .set('Authorization', `Bearer ${token}`)
        .send({ places: [{ id: 'p1', name: '경복궁', lat: 37.5796, lon: 126.977 }], start_time: '9시' })
        .expect(422);

      expect(response.body.error.details).toEqual([{ field: 'start_time', message: expect.any(String) }]);
    });
  });
});
