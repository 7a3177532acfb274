import { HttpStatus, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ExternalApiException } from '../common/exceptions/app.exception';
import { roundTo } from '../common/utils/geo.util';
import { errorMessage } from '../common/utils/http-error.util';
import { KmaCurrentWeather } from '../kma/interfaces/kma-weather.interface';
import { KmaCity } from '../kma/kma.constants';
import { KmaService } from '../kma/kma.service';
import { findCity } from '../kma/kma.utils';
import { UserService } from '../user/user.service';
import { ForecastResponse, WeatherResponse } from './interfaces/weather.interface';
import { DEFAULT_FORECAST_DAYS, findSupportedCity, SupportedCity } from './weather.constants';
import { WeatherApiClient } from './weather-api.client';

export type FavoriteWeather = WeatherResponse | { city: string; error: string };

const MS_TO_KPH = 3.6;

/**
 * Current weather with provider fallback: WeatherAPI, then KMA for Korean cities,
 * then a static placeholder for the supported city list.
 */
@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);

  constructor(
    private readonly weatherApiClient: WeatherApiClient,
    private readonly kmaService: KmaService,
    private readonly userService: UserService,
  ) {}

  async getCurrentWeather(city: string, country?: string): Promise<WeatherResponse> {
    let lastError: unknown;

    if (this.weatherApiClient.isConfigured) {
      try {
        return await this.weatherApiClient.getCurrent(city, country);
      } catch (error) {
        this.logger.warn(`WeatherAPI failed for ${city}, trying KMA: ${errorMessage(error)}`);
        lastError = error;
      }
    }

    const kmaCity = this.resolveKmaCity(city);
    if (kmaCity && this.kmaService.isConfigured) {
      try {
        const observation = await this.kmaService.getCurrentWeather(kmaCity.nx, kmaCity.ny);
        return fromKma(kmaCity, observation);
      } catch (error) {
        this.logger.warn(`KMA failed for ${city}: ${errorMessage(error)}`);
        lastError = error;
      }
    }

    const supported = findSupportedCity(city);
    if (supported) {
      this.logger.warn(`Serving placeholder weather for ${city}`);
      return placeholderWeather(supported);
    }

    if (lastError) {
      throw lastError;
    }
    throw new ExternalApiException('사용 가능한 날씨 제공자가 없습니다.', HttpStatus.SERVICE_UNAVAILABLE);
  }

  getForecast(city: string, days: number = DEFAULT_FORECAST_DAYS, country?: string): Promise<ForecastResponse> {
    return this.weatherApiClient.getForecast(city, days, country);
  }

  async getFavorites(userId: string): Promise<string[]> {
    const user = await this.userService.findOneById(userId);
    if (!user) {
      throw new NotFoundException('사용자를 찾을 수 없습니다.');
    }
    return user.favoriteCities;
  }

  async addFavorite(userId: string, city: string): Promise<string[]> {
    const user = await this.userService.addFavoriteCity(userId, city);
    return user.favoriteCities;
  }

  async removeFavorite(userId: string, city: string): Promise<string[]> {
    const favorites = await this.getFavorites(userId);
    if (!favorites.includes(city)) {
      throw new NotFoundException(`즐겨찾기에 없는 도시입니다: ${city}`);
    }
    const user = await this.userService.removeFavoriteCity(userId, city);
    return user.favoriteCities;
  }

  async getFavoritesWeather(userId: string): Promise<FavoriteWeather[]> {
    const favorites = await this.getFavorites(userId);
    return Promise.all(
      favorites.map((city) =>
        this.getCurrentWeather(city).catch((error: unknown): FavoriteWeather => ({ city, error: errorMessage(error) })),
      ),
    );
  }

  private resolveKmaCity(city: string): KmaCity | undefined {
    return findCity(city) ?? findCity(findSupportedCity(city)?.korean_name ?? '');
  }
}

function fromKma(city: KmaCity, observation: KmaCurrentWeather): WeatherResponse {
  const date = observation.base_date;
  return {
    location: {
      city: city.name,
      country: 'KR',
      region: city.province,
      timezone: 'Asia/Seoul',
      local_time: `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)} ${observation.base_time.slice(0, 2)}:${observation.base_time.slice(2)}`,
    },
    current: {
      temperature: observation.temperature,
      feels_like: observation.temperature,
      condition: observation.sky_condition,
      description: observation.sky_condition,
      icon: '',
      humidity: observation.humidity,
      wind_speed: roundTo(observation.wind_speed * MS_TO_KPH, 1),
      wind_direction: observation.wind_degree,
      pressure: null,
      visibility: null,
      uv_index: null,
    },
    source: 'kma',
  };
}

function placeholderWeather(city: SupportedCity): WeatherResponse {
  return {
    location: {
      city: city.name,
      country: city.country,
      region: city.korean_name,
      timezone: city.timezone,
      local_time: '',
    },
    current: {
      temperature: 20,
      feels_like: 20,
      condition: 'unknown',
      description: '날씨 정보를 일시적으로 가져올 수 없습니다.',
      icon: '',
      humidity: 50,
      wind_speed: 0,
      wind_direction: 0,
      pressure: null,
      visibility: null,
      uv_index: null,
    },
    source: 'fallback',
  };
}
