import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { of, throwError } from 'rxjs';
import { ExternalApiException } from '../common/exceptions/app.exception';
import { WeatherApiClient } from '../weather/weather-api.client';
import { AirQualityService } from './air-quality.service';

const envelope = (items: object[]) => ({
  data: { response: { header: { resultCode: '00', resultMsg: 'NORMAL_CODE' }, body: { items, totalCount: items.length } } },
});

describe('AirQualityService', () => {
  let service: AirQualityService;
  const httpService = { get: jest.fn() };
  const weatherApiClient = { isConfigured: false, getAirQuality: jest.fn() };
  // 08:10 on 2024-05-11 in Seoul
  const now = new Date('2024-05-10T23:10:00Z');

  const createService = async (publicDataKey: string | undefined): Promise<AirQualityService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AirQualityService,
        { provide: HttpService, useValue: httpService },
        { provide: WeatherApiClient, useValue: weatherApiClient },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => (key === 'PUBLIC_DATA_API_KEY' ? publicDataKey : undefined)) },
        },
      ],
    }).compile();
    return module.get<AirQualityService>(AirQualityService);
  };

  beforeEach(() => {
    jest.resetAllMocks();
    weatherApiClient.isConfigured = false;
  });

  describe('without provider keys', () => {
    beforeEach(async () => {
      service = await createService(undefined);
    });

    it('serves built-in readings graded by the bands', async () => {
      const result = await service.getCurrent('서울', now);

      expect(httpService.get).not.toHaveBeenCalled();
      expect(result).toMatchObject({
        city: '서울',
        source: 'builtin',
        timestamp: '2024-05-10T23:10:00.000Z',
        pm10: { value: 45, grade: '보통', unit: '㎍/㎥' },
        o3: { value: 0.03, grade: '좋음', unit: 'ppm' },
        air_quality_index: { value: 50, grade: '보통', color: '#FFFF00' },
        station_name: '서울 측정소',
      });
    });

    it('returns null for a city without data', async () => {
      await expect(service.getCurrent('런던', now)).resolves.toBeNull();
    });

    it('builds 24 hourly forecast entries', async () => {
      const result = await service.getForecast('서울', now);

      expect(result.source).toBe('builtin');
      expect(result.forecast_date).toBe('2024-05-11');
      expect(result.forecasts).toHaveLength(24);
      expect(result.forecasts[0].date).toBe('2024-05-11 08:00');
      expect(result.forecasts[23].date).toBe('2024-05-12 07:00');
    });

    it('filters built-in stations by radius', async () => {
      const stations = await service.getNearbyStations(37.5665, 126.978, 50000);

      expect(stations).toEqual([
        { station_name: '종로구', address: '서울특별시 종로구', latitude: 37.5704, longitude: 126.9997, distance: 1961 },
      ]);
      await expect(service.getNearbyStations(37.5665, 126.978, 1000)).resolves.toEqual([]);
    });
  });

  describe('with an AirKorea key', () => {
    beforeEach(async () => {
      service = await createService('test-key');
    });

    it('maps the real-time measurement', async () => {
      httpService.get.mockReturnValue(
        of(
          envelope([
            {
              stationName: '중구',
              pm10Value: '82',
              pm10Grade1h: '',
              pm25Value: '-',
              pm25Grade1h: '1',
              o3Value: '0.031',
              o3Grade: '2',
            },
          ]),
        ),
      );

      const result = await service.getCurrent('서울', now);

      expect(httpService.get.mock.calls[0][1].params).toMatchObject({
        serviceKey: 'test-key',
        returnType: 'json',
        sidoName: '서울',
      });
      expect(result).toMatchObject({
        source: 'airkorea',
        station_name: '중구',
        pm10: { value: 82, grade: '나쁨' },
        pm25: { value: 0, grade: '좋음' },
        o3: { value: 0.031, grade: '보통' },
        air_quality_index: { value: 82, grade: '나쁨' },
      });
    });

    it('falls back to WeatherAPI and then built-in data', async () => {
      httpService.get.mockReturnValue(throwError(() => new Error('socket hang up')));
      weatherApiClient.isConfigured = true;
      weatherApiClient.getAirQuality.mockResolvedValueOnce({
        location: { lat: 37.57, lon: 126.98 },
        air_quality: { pm10: 40.5, pm2_5: 12.3, 'us-epa-index': 2 },
      });

      const fromWeatherApi = await service.getCurrent('서울', now);

      expect(weatherApiClient.getAirQuality).toHaveBeenCalledWith('37.5665,126.978');
      expect(fromWeatherApi).toMatchObject({
        source: 'weatherapi',
        pm10: { value: 40.5, grade: '좋음', unit: '㎍/㎥' },
        air_quality_index: { value: 40, grade: '보통' },
        latitude: 37.57,
        longitude: 126.98,
      });

      weatherApiClient.getAirQuality.mockRejectedValueOnce(new ExternalApiException('Weather API error', 500));

      await expect(service.getCurrent('서울', now)).resolves.toMatchObject({ source: 'builtin' });
    });

    it('groups forecast grades by date for the region', async () => {
      httpService.get.mockReturnValue(
        of(
          envelope([
            { informCode: 'PM10', informData: '2024-05-12', informGrade: '서울 : 나쁨,부산 : 보통', informOverall: '수도권 나쁨' },
            { informCode: 'PM25', informData: '2024-05-12', informGrade: '서울 : 보통,부산 : 좋음' },
            { informCode: 'PM10', informData: '2024-05-11', informGrade: '서울 : 좋음' },
          ]),
        ),
      );

      const result = await service.getForecast('서울', now);

      expect(httpService.get.mock.calls[0][1].params.searchDate).toBe('2024-05-11');
      expect(result.source).toBe('airkorea');
      expect(result.forecasts).toEqual([
        { date: '2024-05-11', pm10_grade: '좋음', pm25_grade: null, pm10_value: null, pm25_value: null },
        {
          date: '2024-05-12',
          pm10_grade: '나쁨',
          pm25_grade: '보통',
          pm10_value: null,
          pm25_value: null,
          overall: '수도권 나쁨',
        },
      ]);
    });
  });
});
