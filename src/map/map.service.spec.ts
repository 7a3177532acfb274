import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { of, throwError } from 'rxjs';
import { ResourceNotFoundException } from '../common/exceptions/app.exception';
import { MapService } from './map.service';

const naverItem = (title: string, mapx: string, mapy: string) => ({
  title,
  link: '',
  category: '음식점>카페',
  description: '<b>조용한</b> 카페',
  telephone: '',
  address: '서울특별시 종로구',
  roadAddress: '서울특별시 종로구 종로 1',
  mapx,
  mapy,
});

describe('MapService', () => {
  let service: MapService;
  const httpService = { get: jest.fn() };
  const seoulCityHall = { lat: 37.5665, lon: 126.978 };

  const createService = async (keys: Record<string, string>): Promise<MapService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MapService,
        { provide: HttpService, useValue: httpService },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => keys[key]) } },
      ],
    }).compile();
    return module.get<MapService>(MapService);
  };

  beforeEach(() => {
    jest.resetAllMocks();
  });

  describe('with Naver and Google keys', () => {
    beforeEach(async () => {
      service = await createService({
        NAVER_CLIENT_ID: 'test-id',
        NAVER_CLIENT_SECRET: 'test-secret',
        GOOGLE_API_KEY: 'test-key',
      });
    });

    it('maps Naver local search items', async () => {
      httpService.get.mockReturnValue(of({ data: { items: [naverItem('<b>종로</b> 카페', '1269997000', '375704000')] } }));

      const [place] = await service.searchPlaces('종로 카페', 5);

      const [url, config] = httpService.get.mock.calls[0];
      expect(url).toBe('https://openapi.naver.com/v1/search/local.json');
      expect(config.headers).toEqual({ 'X-NCP-APIGW-API-KEY-ID': 'test-id', 'X-NCP-APIGW-API-KEY': 'test-secret' });
      expect(config.params).toEqual({ query: '종로 카페', display: 5, start: 1, sort: 'random' });
      expect(place).toMatchObject({
        name: '종로 카페',
        description: '조용한 카페',
        road_address: '서울특별시 종로구 종로 1',
        latitude: 37.5704,
        longitude: 126.9997,
        source: '네이버',
      });
    });

    it('falls back to Google text search when Naver fails', async () => {
      httpService.get
        .mockReturnValueOnce(throwError(() => new Error('401 Unauthorized')))
        .mockReturnValueOnce(
          of({
            data: {
              status: 'OK',
              results: [
                {
                  place_id: 'place-1',
                  name: '경복궁',
                  formatted_address: '서울특별시 종로구 사직로 161',
                  types: ['tourist_attraction'],
                  geometry: { location: { lat: 37.5796, lng: 126.977 } },
                },
              ],
            },
          }),
        );

      const places = await service.searchPlaces('경복궁');

      expect(httpService.get.mock.calls[1][0]).toBe('https://maps.googleapis.com/maps/api/place/textsearch/json');
      expect(places).toEqual([
        {
          id: 'place-1',
          name: '경복궁',
          address: '서울특별시 종로구 사직로 161',
          road_address: '',
          category: 'tourist_attraction',
          telephone: '',
          link: '',
          description: '',
          latitude: 37.5796,
          longitude: 126.977,
          source: 'google',
        },
      ]);
    });

    it('keeps nearby places inside the radius, nearest first', async () => {
      httpService.get.mockReturnValue(
        of({
          data: {
            items: [
              naverItem('해운대 카페', '1291603000', '351586000'),
              naverItem('종로 카페', '1269997000', '375704000'),
            ],
          },
        }),
      );

      const places = await service.searchNearby(seoulCityHall, '카페', 5000);

      expect(places).toHaveLength(1);
      expect(places[0]).toMatchObject({ name: '종로 카페', distance: 1961 });
    });

    it('uses Google Directions for routes', async () => {
      httpService.get.mockReturnValue(
        of({
          data: {
            status: 'OK',
            routes: [
              {
                summary: '경부고속도로',
                warnings: [],
                overview_polyline: { points: 'abc123' },
                legs: [{ distance: { text: '325 km', value: 325000 }, duration: { text: '4 hours', value: 14400 } }],
              },
            ],
          },
        }),
      );

      const route = await service.getRoute(seoulCityHall, { lat: 35.1796, lon: 129.0756 }, 'driving');

      expect(httpService.get.mock.calls[0][1].params).toMatchObject({
        origin: '37.5665,126.978',
        destination: '35.1796,129.0756',
        mode: 'driving',
        key: 'test-key',
      });
      expect(route).toMatchObject({ distance_km: 325, duration_minutes: 240, polyline: 'abc123', source: 'google' });
    });

    it('estimates the route when Google refuses the request', async () => {
      httpService.get.mockReturnValue(of({ data: { status: 'REQUEST_DENIED', routes: [] } }));

      const route = await service.getRoute(seoulCityHall, { lat: 35.1796, lon: 129.0756 }, 'driving');

      expect(route).toMatchObject({ distance_km: 325.11, duration_minutes: 488, source: 'estimate' });
    });
  });

  describe('without keys', () => {
    beforeEach(async () => {
      service = await createService({});
    });

    it('returns no places', async () => {
      await expect(service.searchPlaces('경복궁')).resolves.toEqual([]);
      expect(httpService.get).not.toHaveBeenCalled();
    });

    it('geocodes supported cities from the static table', async () => {
      await expect(service.geocode('부산')).resolves.toEqual({
        address: '부산',
        latitude: 35.1796,
        longitude: 129.0756,
        source: 'static',
      });
      await expect(service.geocode('아틀란티스')).rejects.toThrow(ResourceNotFoundException);
    });

    it('looks up city coordinates', () => {
      expect(service.getCityCoordinates('제주')).toEqual({ city: '제주', latitude: 33.4996, longitude: 126.5312 });
      expect(() => service.getCityCoordinates('런던')).toThrow(ResourceNotFoundException);
    });
  });
});
