import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { ResourceNotFoundException } from '../../src/common/exceptions/app.exception';
import { AttractionsController } from '../../src/tourism/attractions.controller';
import { TourismService } from '../../src/tourism/tourism.service';
import { createTestApp } from '../utils/e2e-app';

describe('Attractions (e2e)', () => {
  let app: INestApplication;
  const tourismService = { searchAttractions: jest.fn(), getAttractionsByRegion: jest.fn(), getAttraction: jest.fn() };

  beforeAll(async () => {
    const testApp = await createTestApp({
      controllers: [AttractionsController],
      providers: [{ provide: TourismService, useValue: tourismService }],
    });
    app = testApp.app;
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('GET /api/v1/attractions/search wraps the suggestions', async () => {
    tourismService.searchAttractions.mockResolvedValue([]);

    const response = await request(app.getHttpServer()).get('/api/v1/attractions/search').query({ query: '경복궁' }).expect(200);

    expect(tourismService.searchAttractions).toHaveBeenCalledWith('경복궁', 10);
    expect(response.body).toMatchObject({ success: true, data: { suggestions: [] } });
  });

  it('GET /api/v1/attractions/by-region rejects a limit above 500', async () => {
    await request(app.getHttpServer()).get('/api/v1/attractions/by-region?region_code=11&limit=501').expect(422);

    expect(tourismService.getAttractionsByRegion).not.toHaveBeenCalled();
  });

  it('GET /api/v1/attractions/by-region is not taken for a content id', async () => {
    tourismService.getAttractionsByRegion.mockResolvedValue({ attractions: [], total: 0 });

    await request(app.getHttpServer()).get('/api/v1/attractions/by-region?region_code=11').expect(200);

    expect(tourismService.getAttractionsByRegion).toHaveBeenCalledWith('11', 100);
    expect(tourismService.getAttraction).not.toHaveBeenCalled();
  });

  it('GET /api/v1/attractions/:contentId answers 404 for an unknown attraction', async () => {
    tourismService.getAttraction.mockRejectedValue(new ResourceNotFoundException('관광지를 찾을 수 없습니다.'));

    const response = await request(app.getHttpServer()).get('/api/v1/attractions/0').expect(404);

    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: '관광지를 찾을 수 없습니다.' });
  });
});
