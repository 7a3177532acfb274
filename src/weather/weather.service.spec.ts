import { HttpStatus, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ExternalApiException } from '../common/exceptions/app.exception';
import { KmaService } from '../kma/kma.service';
import { UserService } from '../user/user.service';
import { WeatherResponse } from './interfaces/weather.interface';
import { WeatherApiClient } from './weather-api.client';
import { WeatherService } from './weather.service';

const weatherApiResponse = (city: string): WeatherResponse => ({
  location: { city, country: 'South Korea', region: '', timezone: 'Asia/Seoul', local_time: '2024-05-11 08:10' },
  current: {
    temperature: 18,
    feels_like: 18,
    condition: '1000',
    description: '맑음',
    icon: '',
    humidity: 60,
    wind_speed: 7.2,
    wind_direction: 250,
    pressure: 1012,
    visibility: 10,
    uv_index: 5,
  },
  source: 'weatherapi',
});

describe('WeatherService', () => {
  let service: WeatherService;
  const weatherApiClient = { isConfigured: true, getCurrent: jest.fn(), getForecast: jest.fn() };
  const kmaService = { isConfigured: true, getCurrentWeather: jest.fn() };
  const userService = { findOneById: jest.fn(), addFavoriteCity: jest.fn(), removeFavoriteCity: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    weatherApiClient.isConfigured = true;
    kmaService.isConfigured = true;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherService,
        { provide: WeatherApiClient, useValue: weatherApiClient },
        { provide: KmaService, useValue: kmaService },
        { provide: UserService, useValue: userService },
      ],
    }).compile();

    service = module.get<WeatherService>(WeatherService);
  });

  describe('getCurrentWeather', () => {
    it('returns WeatherAPI data when available', async () => {
      weatherApiClient.getCurrent.mockResolvedValue(weatherApiResponse('Seoul'));

      const result = await service.getCurrentWeather('Seoul', 'KR');

      expect(weatherApiClient.getCurrent).toHaveBeenCalledWith('Seoul', 'KR');
      expect(result.source).toBe('weatherapi');
      expect(kmaService.getCurrentWeather).not.toHaveBeenCalled();
    });

    it('falls back to KMA for a Korean city', async () => {
      weatherApiClient.getCurrent.mockRejectedValue(new ExternalApiException('Weather API error', 500));
      kmaService.getCurrentWeather.mockResolvedValue({
        nx: 60,
        ny: 127,
        temperature: 17.3,
        humidity: 72,
        rainfall: 0,
        wind_speed: 2.5,
        wind_direction: '남서',
        wind_degree: 225,
        precipitation_type: '없음',
        sky_condition: '맑음',
        base_date: '20240511',
        base_time: '0800',
        source: 'KMA',
      });

      const result = await service.getCurrentWeather('Seoul');

      expect(kmaService.getCurrentWeather).toHaveBeenCalledWith(60, 127);
      expect(result).toEqual({
        location: {
          city: '서울',
          country: 'KR',
          region: '서울특별시',
          timezone: 'Asia/Seoul',
          local_time: '2024-05-11 08:00',
        },
        current: {
          temperature: 17.3,
          feels_like: 17.3,
          condition: '맑음',
          description: '맑음',
          icon: '',
          humidity: 72,
          wind_speed: 9,
          wind_direction: 225,
          pressure: null,
          visibility: null,
          uv_index: null,
        },
        source: 'kma',
      });
    });

    it('serves a placeholder for a supported foreign city', async () => {
      weatherApiClient.getCurrent.mockRejectedValue(new ExternalApiException('Weather API error', 500));

      const result = await service.getCurrentWeather('Tokyo');

      expect(kmaService.getCurrentWeather).not.toHaveBeenCalled();
      expect(result.source).toBe('fallback');
      expect(result.location).toMatchObject({ city: 'Tokyo', country: 'JP', timezone: 'Asia/Tokyo' });
    });

    it('serves a placeholder when both providers fail for a Korean city', async () => {
      weatherApiClient.getCurrent.mockRejectedValue(new ExternalApiException('Weather API error', 500));
      kmaService.getCurrentWeather.mockRejectedValue(new ExternalApiException('기상청 API 오류', 500));

      const result = await service.getCurrentWeather('부산');

      expect(kmaService.getCurrentWeather).toHaveBeenCalledWith(97, 74);
      expect(result.source).toBe('fallback');
      expect(result.location.city).toBe('Busan');
    });

    it('rethrows the provider error for an unsupported city', async () => {
      const error = new ExternalApiException('Invalid location', HttpStatus.BAD_REQUEST);
      weatherApiClient.getCurrent.mockRejectedValue(error);

      await expect(service.getCurrentWeather('Atlantis')).rejects.toBe(error);
    });

    it('reports 503 when no provider is configured', async () => {
      weatherApiClient.isConfigured = false;

      await expect(service.getCurrentWeather('Atlantis')).rejects.toMatchObject({
        status: HttpStatus.SERVICE_UNAVAILABLE,
      });
      expect(weatherApiClient.getCurrent).not.toHaveBeenCalled();
    });
  });

  describe('favorites', () => {
    it('refuses to remove a city that is not a favorite', async () => {
      userService.findOneById.mockResolvedValue({ favoriteCities: ['Seoul'] });

      await expect(service.removeFavorite('user-1', 'Busan')).rejects.toThrow(NotFoundException);
      expect(userService.removeFavoriteCity).not.toHaveBeenCalled();
    });

    it('removes an existing favorite', async () => {
      userService.findOneById.mockResolvedValue({ favoriteCities: ['Seoul', 'Busan'] });
      userService.removeFavoriteCity.mockResolvedValue({ favoriteCities: ['Seoul'] });

      await expect(service.removeFavorite('user-1', 'Busan')).resolves.toEqual(['Seoul']);
      expect(userService.removeFavoriteCity).toHaveBeenCalledWith('user-1', 'Busan');
    });

    it('reports a failing city inside the favorites weather list', async () => {
      userService.findOneById.mockResolvedValue({ favoriteCities: ['Seoul', 'Atlantis'] });
      weatherApiClient.getCurrent.mockImplementation(async (city: string) => {
        if (city === 'Seoul') {
          return weatherApiResponse('Seoul');
        }
        throw new ExternalApiException('Invalid location', HttpStatus.BAD_REQUEST);
      });

      const result = await service.getFavoritesWeather('user-1');

      expect(result).toEqual([weatherApiResponse('Seoul'), { city: 'Atlantis', error: 'Invalid location' }]);
    });
  });
});
