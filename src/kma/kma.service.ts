import { BadRequestException, HttpStatus, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ExternalApiException } from '../common/exceptions/app.exception';
import { seoulDateString } from '../common/utils/date.util';
import { classifyHttpError, errorMessage, HTTP_TIMEOUT_MS } from '../common/utils/http-error.util';
import { KMA_BASE_URL, KMA_CITIES, KmaCity, PROVINCE_CITIES } from './kma.constants';
import {
  KmaCurrentWeather,
  KmaEnvelope,
  KmaForecastItem,
  KmaMidForecast,
  KmaMidForecastItem,
  KmaObservationItem,
  KmaShortForecast,
  KmaWarningItem,
  KmaWarnings,
} from './interfaces/kma-weather.interface';
import { findCity, getBaseDateTime, parseObservation, summarizeForecast } from './kma.utils';

export type CityWeatherResult =
  | { city: string; province: string; weather: KmaCurrentWeather }
  | { city: string; province: string; error: string };

/**
 * Client for the Korea Meteorological Administration public data services.
 */
@Injectable()
export class KmaService {
  private readonly logger = new Logger(KmaService.name);
  private readonly apiKey: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.apiKey = this.configService.get<string>('KMA_API_KEY') || '';
    if (!this.apiKey) {
      this.logger.warn('Missing KMA_API_KEY in environment variables');
    }
  }

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  getSupportedCity(name: string): KmaCity {
    const city = findCity(name);
    if (!city) {
      throw new BadRequestException(`지원하지 않는 도시입니다: ${name}`);
    }
    return city;
  }

  getProvinces(): string[] {
    return Object.keys(PROVINCE_CITIES);
  }

  getCities(): KmaCity[] {
    return [...KMA_CITIES];
  }

  async getCurrentWeather(nx: number, ny: number, now: Date = new Date()): Promise<KmaCurrentWeather> {
    const { baseDate, baseTime } = getBaseDateTime(now);
    const items = await this.request<KmaObservationItem>('VilageFcstInfoService_2.0/getUltraSrtNcst', {
      pageNo: 1,
      numOfRows: 1000,
      base_date: baseDate,
      base_time: baseTime,
      nx,
      ny,
    });

    return {
      nx,
      ny,
      ...parseObservation(items),
      base_date: baseDate,
      base_time: baseTime,
      source: 'KMA',
    };
  }

  async getCurrentWeatherByCity(cityName: string): Promise<KmaCurrentWeather> {
    const city = this.getSupportedCity(cityName);
    return this.getCurrentWeather(city.nx, city.ny);
  }

  async getShortForecast(nx: number, ny: number, now: Date = new Date()): Promise<KmaShortForecast> {
    const { baseDate, baseTime } = getBaseDateTime(now);
    const items = await this.request<KmaForecastItem>('VilageFcstInfoService_2.0/getVilageFcst', {
      pageNo: 1,
      numOfRows: 1000,
      base_date: baseDate,
      base_time: baseTime,
      nx,
      ny,
    });

    return {
      nx,
      ny,
      base_date: baseDate,
      base_time: baseTime,
      forecast: summarizeForecast(items),
      source: 'KMA',
    };
  }

  async getMidForecast(regId: string, now: Date = new Date()): Promise<KmaMidForecast> {
    const items = await this.request<KmaMidForecastItem>('MidFcstInfoService/getMidFcst', {
      pageNo: 1,
      numOfRows: 10,
      regId,
      tmFc: `${seoulDateString(now)}0600`,
    });

    return {
      reg_id: regId,
      forecast: items
        .filter((item) => item.rnSt !== undefined && item.rnSt !== '')
        .map((item) => ({
          date: (item.tmFc ?? '').slice(0, 8),
          weather: item.wfSv ?? '',
          rainfall_probability: Number.parseInt(item.rnSt ?? '0', 10),
          max_temp: Number.parseInt(item.taMax ?? '0', 10),
          min_temp: Number.parseInt(item.taMin ?? '0', 10),
        })),
    };
  }

  async getWarnings(area: string, now: Date = new Date()): Promise<KmaWarnings> {
    const items = await this.request<KmaWarningItem>('WarningInfoService/getWarningInfo', {
      pageNo: 1,
      numOfRows: 10,
      fromTmFc: seoulDateString(now, -1),
      toTmFc: seoulDateString(now),
      area,
    });

    return {
      area,
      warnings: items.map((item) => ({
        area: item.area ?? '',
        warning_type: item.warningType ?? '',
        warning_level: item.warningLevel ?? '',
        warning_message: item.warningMessage ?? '',
        issue_time: item.issueTime ?? '',
        cancel_time: item.cancelTime ?? '',
      })),
    };
  }

  /**
   * Current weather for every supported city; one failing city does not fail the rest.
   */
  async getAllCitiesCurrent(cities: readonly KmaCity[] = KMA_CITIES): Promise<CityWeatherResult[]> {
    return Promise.all(
      cities.map(async (city): Promise<CityWeatherResult> => {
        try {
          const weather = await this.getCurrentWeather(city.nx, city.ny);
          return { city: city.name, province: city.province, weather };
        } catch (error) {
          this.logger.warn(`KMA current weather failed for ${city.name}: ${errorMessage(error)}`);
          return { city: city.name, province: city.province, error: errorMessage(error) };
        }
      }),
    );
  }

  async getCurrentByProvince(province: string): Promise<{ province: string; cities: CityWeatherResult[] }> {
    const names = PROVINCE_CITIES[province];
    if (!names) {
      throw new NotFoundException(`지원하지 않는 지역입니다: ${province}`);
    }
    const cities = KMA_CITIES.filter((city) => names.includes(city.name));
    return { province, cities: await this.getAllCitiesCurrent(cities) };
  }

  private async request<TItem>(path: string, params: Record<string, string | number>): Promise<TItem[]> {
    if (!this.isConfigured) {
      throw new ExternalApiException('기상청 API 키가 설정되지 않았습니다.', HttpStatus.SERVICE_UNAVAILABLE, 'kma');
    }

    let data: KmaEnvelope<TItem>;
    try {
      const response = await firstValueFrom(
        this.httpService.get<KmaEnvelope<TItem>>(`${KMA_BASE_URL}/${path}`, {
          params: { serviceKey: this.apiKey, dataType: 'JSON', ...params },
          timeout: HTTP_TIMEOUT_MS,
        }),
      );
      data = response.data;
    } catch (error) {
      const failure = classifyHttpError(error);
      this.logger.error(`KMA ${path} failed: ${failure.message}`);
      if (failure.kind === 'timeout') {
        throw new ExternalApiException('기상청 API 타임아웃', HttpStatus.REQUEST_TIMEOUT, 'kma');
      }
      if (failure.kind === 'network') {
        throw new ExternalApiException('기상청 API 서비스 불가', HttpStatus.SERVICE_UNAVAILABLE, 'kma');
      }
      throw new ExternalApiException('기상청 API 오류', HttpStatus.INTERNAL_SERVER_ERROR, 'kma');
    }

    if (!data?.response?.header) {
      throw new ExternalApiException('기상청 API 응답 형식이 올바르지 않습니다.', HttpStatus.BAD_GATEWAY, 'kma');
    }
    const { header, body } = data.response;
    if (header.resultCode !== '00') {
      this.logger.error(`KMA ${path} returned ${header.resultCode}: ${header.resultMsg}`);
      throw new ExternalApiException(`기상청 API 오류: ${header.resultMsg}`, HttpStatus.INTERNAL_SERVER_ERROR, 'kma');
    }
    const items = body?.items;
    return items ? items.item ?? [] : [];
  }
}
