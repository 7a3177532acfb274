import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ExternalApiException } from '../common/exceptions/app.exception';
import { classifyHttpError, HTTP_TIMEOUT_MS } from '../common/utils/http-error.util';
import {
  WeatherApiAirQuality,
  WeatherApiCurrentResponse,
  WeatherApiForecastDay,
  WeatherApiForecastResponse,
  WeatherApiLocation,
} from './interfaces/weatherapi-response.interface';
import {
  CurrentWeather,
  DailyForecast,
  ForecastResponse,
  WeatherLocation,
  WeatherResponse,
} from './interfaces/weather.interface';

export const MAX_FORECAST_DAYS = 14;

export interface WeatherApiAirQualityResult {
  location: WeatherApiLocation;
  air_quality: WeatherApiAirQuality;
}

/**
 * WeatherAPI.com adapter. Shared by the weather, KMA compare and air quality modules.
 */
@Injectable()
export class WeatherApiClient {
  private readonly logger = new Logger(WeatherApiClient.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.apiKey = this.configService.get<string>('WEATHER_API_KEY') || '';
    this.baseUrl = this.configService.get<string>('WEATHER_API_URL') || 'http://api.weatherapi.com/v1';
    if (!this.apiKey) {
      this.logger.warn('Missing WEATHER_API_KEY in environment variables');
    }
  }

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async getCurrent(city: string, country?: string): Promise<WeatherResponse> {
    const data = await this.request<WeatherApiCurrentResponse>('current.json', {
      q: buildQuery(city, country),
      aqi: 'no',
    });
    return {
      location: toLocation(data.location),
      current: toCurrent(data),
      source: 'weatherapi',
    };
  }

  async getForecast(city: string, days: number, country?: string): Promise<ForecastResponse> {
    const data = await this.request<WeatherApiForecastResponse>('forecast.json', {
      q: buildQuery(city, country),
      days: Math.min(Math.max(days, 1), MAX_FORECAST_DAYS),
      aqi: 'no',
      alerts: 'no',
    });
    return {
      location: toLocation(data.location),
      current: toCurrent(data),
      forecast: data.forecast.forecastday.map(toDailyForecast),
      source: 'weatherapi',
    };
  }

  /**
   * Current air quality block for a city or a "lat,lon" query.
   */
  async getAirQuality(query: string): Promise<WeatherApiAirQualityResult> {
    const data = await this.request<WeatherApiCurrentResponse>('current.json', { q: query, aqi: 'yes' });
    return { location: data.location, air_quality: data.current.air_quality ?? {} };
  }

  private async request<T>(path: string, params: Record<string, string | number>): Promise<T> {
    if (!this.isConfigured) {
      throw new ExternalApiException('Weather API key is not configured', HttpStatus.SERVICE_UNAVAILABLE, 'weatherapi');
    }

    try {
      const response = await firstValueFrom(
        this.httpService.get<T>(`${this.baseUrl}/${path}`, {
          params: { key: this.apiKey, lang: 'ko', ...params },
          timeout: HTTP_TIMEOUT_MS,
        }),
      );
      return response.data;
    } catch (error) {
      const failure = classifyHttpError(error);
      this.logger.warn(`WeatherAPI ${path} failed: ${failure.message}`);
      switch (failure.kind) {
        case 'status':
          if (failure.status === HttpStatus.BAD_REQUEST) {
            throw new ExternalApiException('Invalid location', HttpStatus.BAD_REQUEST, 'weatherapi');
          }
          if (failure.status === HttpStatus.UNAUTHORIZED || failure.status === HttpStatus.FORBIDDEN) {
            throw new ExternalApiException('Invalid API key', HttpStatus.UNAUTHORIZED, 'weatherapi');
          }
          throw new ExternalApiException('Weather API error', HttpStatus.INTERNAL_SERVER_ERROR, 'weatherapi');
        case 'timeout':
          throw new ExternalApiException('Weather API timeout', HttpStatus.REQUEST_TIMEOUT, 'weatherapi');
        case 'network':
          throw new ExternalApiException('Weather API unavailable', HttpStatus.SERVICE_UNAVAILABLE, 'weatherapi');
        default:
          throw new ExternalApiException('Weather API error', HttpStatus.INTERNAL_SERVER_ERROR, 'weatherapi');
      }
    }
  }
}

const buildQuery = (city: string, country?: string): string => (country ? `${city},${country}` : city);

function toLocation(location: WeatherApiLocation): WeatherLocation {
  return {
    city: location.name,
    country: location.country,
    region: location.region,
    timezone: location.tz_id,
    local_time: location.localtime,
  };
}

function toCurrent({ current }: WeatherApiCurrentResponse): CurrentWeather {
  return {
    temperature: current.temp_c,
    feels_like: current.feelslike_c,
    condition: String(current.condition.code),
    description: current.condition.text,
    icon: current.condition.icon,
    humidity: current.humidity,
    wind_speed: current.wind_kph,
    wind_direction: current.wind_degree,
    pressure: current.pressure_mb,
    visibility: current.vis_km,
    uv_index: current.uv,
  };
}

function toDailyForecast({ date, day }: WeatherApiForecastDay): DailyForecast {
  return {
    date,
    temperature_max: day.maxtemp_c,
    temperature_min: day.mintemp_c,
    condition: String(day.condition.code),
    description: day.condition.text,
    icon: day.condition.icon,
    humidity: day.avghumidity,
    wind_speed: day.maxwind_kph,
    precipitation_chance: day.daily_chance_of_rain,
  };
}
