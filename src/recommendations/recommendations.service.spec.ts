import { BadRequestException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';
import { Types } from 'mongoose';
import { mockQuery } from '../../test/utils/query.mock';
import { KmaService } from '../kma/kma.service';
import { UserService } from '../user/user.service';
import { RecommendationsService } from './recommendations.service';
import { Destination } from './schemas/destination.schema';

describe('RecommendationsService', () => {
  let service: RecommendationsService;
  const destinationModel = { find: jest.fn(), findOne: jest.fn(), countDocuments: jest.fn(), create: jest.fn(), updateOne: jest.fn() };
  const kmaService = { getSupportedCity: jest.fn(), getCurrentWeather: jest.fn() };
  const userService = { findOneById: jest.fn() };
  const userId = new Types.ObjectId().toString();
  const seoul = { name: '서울', province: '서울특별시', nx: 60, ny: 127, lat: 37.5665, lon: 126.978, midRegionCode: '11B10101' };

  const destination = (name: string, fields: Partial<Destination> = {}) => ({
    _id: new Types.ObjectId(),
    name,
    province: '서울특별시',
    tags: [],
    rating: null,
    status: 'active',
    ...fields,
  });

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecommendationsService,
        { provide: getModelToken(Destination.name), useValue: destinationModel },
        { provide: KmaService, useValue: kmaService },
        { provide: UserService, useValue: userService },
      ],
    }).compile();
    service = module.get<RecommendationsService>(RecommendationsService);
  });

  describe('recommendByWeather', () => {
    it('looks up destinations tagged for rain and ranks them with the user preferences', async () => {
      kmaService.getSupportedCity.mockReturnValue(seoul);
      kmaService.getCurrentWeather.mockResolvedValue({ sky_condition: '비', temperature: 14 });
      userService.findOneById.mockResolvedValue({ preferences: ['#카페'] });
      const museum = destination('박물관', { tags: ['#박물관'], rating: 4.7 });
      const cafe = destination('카페거리', { tags: ['#실내', '#카페'], rating: 4 });
      destinationModel.find.mockReturnValue(mockQuery([museum, cafe]));

      const result = await service.recommendByWeather('서울특별시', '서울', userId);

      expect(kmaService.getCurrentWeather).toHaveBeenCalledWith(60, 127, expect.any(Date));
      expect(destinationModel.find).toHaveBeenCalledWith({
        province: '서울특별시',
        status: 'active',
        tags: { $in: ['#실내', '#박물관', '#미술관', '#아쿠아리움', '#카페'] },
      });
      expect(result.tags).toEqual(['#실내', '#박물관', '#미술관', '#아쿠아리움', '#카페']);
      expect(result.destinations.map((d) => [d.destination.name, d.score])).toEqual([
        ['카페거리', 5],
        ['박물관', 4.7],
      ]);
    });

    it('takes every active destination of the province when the sky maps to no tags', async () => {
      kmaService.getSupportedCity.mockReturnValue(seoul);
      kmaService.getCurrentWeather.mockResolvedValue({ sky_condition: '알 수 없음' });
      userService.findOneById.mockResolvedValue(null);
      destinationModel.find.mockReturnValue(mockQuery([destination('아무곳')]));

      const result = await service.recommendByWeather('서울특별시', '서울', userId);

      expect(destinationModel.find).toHaveBeenCalledWith({ province: '서울특별시', status: 'active' });
      expect(result.tags).toEqual([]);
      expect(result.destinations[0].score).toBe(3);
    });

    it('rejects an unsupported city before calling the weather service', async () => {
      kmaService.getSupportedCity.mockImplementation(() => {
        throw new BadRequestException('지원하지 않는 도시입니다: 아틀란티스');
      });

      await expect(service.recommendByWeather('서울특별시', '아틀란티스', userId)).rejects.toMatchObject({ status: 400 });
      expect(kmaService.getCurrentWeather).not.toHaveBeenCalled();
    });
  });

  it('lists active destinations by popularity with region and category filters', async () => {
    const query = mockQuery([]);
    destinationModel.find.mockReturnValue(query);
    destinationModel.countDocuments.mockReturnValue(mockQuery(7));

    const { total } = await service.list({ page: 2, limit: 5, region: '종로', category: '역사' });

    const filter = { status: 'active', region: { $regex: '종로', $options: 'i' }, category: '역사' };
    expect(destinationModel.find).toHaveBeenCalledWith(filter);
    expect(destinationModel.countDocuments).toHaveBeenCalledWith(filter);
    expect(query.sort).toHaveBeenCalledWith({ popularityScore: -1 });
    expect(query.skip).toHaveBeenCalledWith(5);
    expect(query.limit).toHaveBeenCalledWith(5);
    expect(total).toBe(7);
  });

  it('escapes regex characters in the region filter', async () => {
    destinationModel.find.mockReturnValue(mockQuery([]));

    await service.popular({ limit: 3, region: '(중구)' });

    expect(destinationModel.find).toHaveBeenCalledWith({ status: 'active', region: { $regex: '\\(중구\\)', $options: 'i' } });
  });

  describe('get', () => {
    it('answers 404 for a malformed id without querying', async () => {
      await expect(service.get('nope')).rejects.toMatchObject({ status: 404 });
      expect(destinationModel.findOne).not.toHaveBeenCalled();
    });

    it('answers 404 for an inactive or unknown destination', async () => {
      destinationModel.findOne.mockReturnValue(mockQuery(null));
      const id = new Types.ObjectId().toString();

      await expect(service.get(id)).rejects.toMatchObject({ status: 404 });
      expect(destinationModel.findOne).toHaveBeenCalledWith({ _id: id, status: 'active' });
    });
  });

  it('keeps destinations within the distance and ranks them', async () => {
    const near = destination('가까운곳', { latitude: 37.5796, longitude: 126.977, rating: 4 });
    const nearer = destination('더가까운곳', { latitude: 37.5239, longitude: 126.9805, rating: 4, tags: ['#카페'] });
    const far = destination('부산', { latitude: 35.1587, longitude: 129.1604, rating: 5 });
    destinationModel.find.mockReturnValue(mockQuery([near, nearer, far]));

    const results = await service.nearby({ lat: 37.5665, lon: 126.978 }, 30, ['#카페']);

    expect(results.map((r) => [r.destination.name, r.score])).toEqual([
      ['더가까운곳', 5],
      ['가까운곳', 4],
    ]);
    expect(results[0].distanceKm).toBeCloseTo(4.742, 2);
  });

  it('upserts seed destinations by name and province', async () => {
    destinationModel.updateOne
      .mockReturnValueOnce(mockQuery({ matchedCount: 0, upsertedCount: 1 }))
      .mockReturnValueOnce(mockQuery({ matchedCount: 1, upsertedCount: 0 }));
    const seed = { name: '서울숲', province: '서울특별시', tags: ['#공원'] };

    await expect(service.upsert(seed)).resolves.toBe('created');
    await expect(service.upsert(seed)).resolves.toBe('updated');
    expect(destinationModel.updateOne).toHaveBeenCalledWith(
      { name: '서울숲', province: '서울특별시' },
      { $set: seed },
      { upsert: true },
    );
  });
});
