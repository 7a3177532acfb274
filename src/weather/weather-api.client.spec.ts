import { HttpStatus } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AxiosError, AxiosHeaders } from 'axios';
import { of, throwError } from 'rxjs';
import { WeatherApiClient } from './weather-api.client';

const location = {
  name: 'Seoul',
  region: 'Seoul',
  country: 'South Korea',
  lat: 37.57,
  lon: 127,
  tz_id: 'Asia/Seoul',
  localtime: '2024-05-11 08:10',
};

const current = {
  temp_c: 18.2,
  feelslike_c: 17.5,
  condition: { text: '맑음', icon: '//cdn.weatherapi.com/weather/64x64/day/113.png', code: 1000 },
  humidity: 60,
  wind_kph: 7.2,
  wind_degree: 250,
  pressure_mb: 1012,
  vis_km: 10,
  uv: 5,
};

const httpError = (status: number) =>
  new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, {
    status,
    statusText: '',
    data: {},
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

describe('WeatherApiClient', () => {
  let client: WeatherApiClient;
  const httpService = { get: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherApiClient,
        { provide: HttpService, useValue: httpService },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => (key === 'WEATHER_API_KEY' ? 'test-key' : undefined)) } },
      ],
    }).compile();

    client = module.get<WeatherApiClient>(WeatherApiClient);
  });

  it('maps the current weather payload', async () => {
    httpService.get.mockReturnValue(of({ data: { location, current } }));

    const result = await client.getCurrent('Seoul', 'KR');

    expect(httpService.get).toHaveBeenCalledWith('http://api.weatherapi.com/v1/current.json', {
      params: { key: 'test-key', lang: 'ko', q: 'Seoul,KR', aqi: 'no' },
      timeout: 10_000,
    });
    expect(result).toEqual({
      location: {
        city: 'Seoul',
        country: 'South Korea',
        region: 'Seoul',
        timezone: 'Asia/Seoul',
        local_time: '2024-05-11 08:10',
      },
      current: {
        temperature: 18.2,
        feels_like: 17.5,
        condition: '1000',
        description: '맑음',
        icon: '//cdn.weatherapi.com/weather/64x64/day/113.png',
        humidity: 60,
        wind_speed: 7.2,
        wind_direction: 250,
        pressure: 1012,
        visibility: 10,
        uv_index: 5,
      },
      source: 'weatherapi',
    });
  });

  it('caps forecast days at 14 and maps each day', async () => {
    httpService.get.mockReturnValue(
      of({
        data: {
          location,
          current,
          forecast: {
            forecastday: [
              {
                date: '2024-05-11',
                day: {
                  maxtemp_c: 24,
                  mintemp_c: 13,
                  avghumidity: 55,
                  maxwind_kph: 14.4,
                  daily_chance_of_rain: 30,
                  condition: { text: '구름 조금', icon: 'icon.png', code: 1003 },
                },
              },
            ],
          },
        },
      }),
    );

    const result = await client.getForecast('Seoul', 30);

    expect(httpService.get.mock.calls[0][1].params).toMatchObject({ q: 'Seoul', days: 14 });
    expect(result.forecast).toEqual([
      {
        date: '2024-05-11',
        temperature_max: 24,
        temperature_min: 13,
        condition: '1003',
        description: '구름 조금',
        icon: 'icon.png',
        humidity: 55,
        wind_speed: 14.4,
        precipitation_chance: 30,
      },
    ]);
  });

  it.each([
    [400, HttpStatus.BAD_REQUEST, 'Invalid location'],
    [401, HttpStatus.UNAUTHORIZED, 'Invalid API key'],
    [403, HttpStatus.UNAUTHORIZED, 'Invalid API key'],
    [502, HttpStatus.INTERNAL_SERVER_ERROR, 'Weather API error'],
  ])('maps upstream status %i to %i', async (upstream, status, message) => {
    httpService.get.mockReturnValue(throwError(() => httpError(upstream)));

    await expect(client.getCurrent('Nowhere')).rejects.toMatchObject({ status, message });
  });

  it('maps timeouts and network failures', async () => {
    httpService.get.mockReturnValueOnce(throwError(() => new AxiosError('timeout', 'ECONNABORTED')));
    await expect(client.getCurrent('Seoul')).rejects.toMatchObject({ status: HttpStatus.REQUEST_TIMEOUT });

    httpService.get.mockReturnValueOnce(throwError(() => new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND')));
    await expect(client.getCurrent('Seoul')).rejects.toMatchObject({ status: HttpStatus.SERVICE_UNAVAILABLE });
  });

  it('requests the air quality block', async () => {
    httpService.get.mockReturnValue(
      of({ data: { location, current: { ...current, air_quality: { pm10: 42.1, 'us-epa-index': 2 } } } }),
    );

    const result = await client.getAirQuality('37.5665,126.978');

    expect(httpService.get.mock.calls[0][1].params).toMatchObject({ q: '37.5665,126.978', aqi: 'yes' });
    expect(result.air_quality).toEqual({ pm10: 42.1, 'us-epa-index': 2 });
  });
});
