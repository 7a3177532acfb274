import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { seoulHourLabel, seoulIsoDate } from '../common/utils/date.util';
import { haversineKm } from '../common/utils/geo.util';
import { errorMessage, HTTP_TIMEOUT_MS } from '../common/utils/http-error.util';
import { KMA_CITIES } from '../kma/kma.constants';
import { findCity } from '../kma/kma.utils';
import { WeatherApiClient } from '../weather/weather-api.client';
import { AIRKOREA_BASE_URL } from './air-quality.constants';
import {
  airKoreaGrade,
  calculateAqi,
  parseMeasurement,
  reading,
  regionGrade,
  usAqiToKorean,
} from './air-quality.utils';
import builtinReadings from './data/builtin-air-quality.json';
import builtinStations from './data/builtin-stations.json';
import {
  AirKoreaEnvelope,
  AirKoreaForecastItem,
  AirKoreaMeasurementItem,
  AirKoreaStationItem,
  AirQualityForecast,
  AirQualityForecastEntry,
  AirQualityReading,
  MonitoringStation,
  Pollutant,
} from './interfaces/air-quality.interface';

type BuiltinValues = Record<Pollutant, number>;

const BUILTIN_READINGS: Readonly<Record<string, BuiltinValues>> = builtinReadings;

/**
 * Air quality with provider fallback: AirKorea, then WeatherAPI, then built-in readings.
 */
@Injectable()
export class AirQualityService {
  private readonly logger = new Logger(AirQualityService.name);
  private readonly publicDataApiKey: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly weatherApiClient: WeatherApiClient,
  ) {
    this.publicDataApiKey = this.configService.get<string>('PUBLIC_DATA_API_KEY') || '';
    if (!this.publicDataApiKey) {
      this.logger.warn('Missing PUBLIC_DATA_API_KEY in environment variables');
    }
  }

  get isConfigured(): boolean {
    return this.publicDataApiKey.length > 0;
  }

  async getCurrent(city: string, now: Date = new Date()): Promise<AirQualityReading | null> {
    return (
      (await this.getFromAirKorea(city, now)) ??
      (await this.getFromWeatherApi(city, now)) ??
      this.getBuiltIn(city, now)
    );
  }

  async getFromAirKorea(city: string, now: Date = new Date()): Promise<AirQualityReading | null> {
    if (!this.isConfigured) {
      return null;
    }
    const items = await this.request<AirKoreaMeasurementItem>('ArpltnInforInqireSvc/getCtprvnRltmMesureDnsty', {
      sidoName: city,
      numOfRows: 1,
      pageNo: 1,
      ver: '1.4',
    });
    const item = items?.[0];
    if (!item) {
      return null;
    }

    const values: BuiltinValues = {
      pm10: parseMeasurement(item.pm10Value),
      pm25: parseMeasurement(item.pm25Value),
      o3: parseMeasurement(item.o3Value),
      no2: parseMeasurement(item.no2Value),
      co: parseMeasurement(item.coValue),
      so2: parseMeasurement(item.so2Value),
    };
    const codes: Record<Pollutant, string | undefined> = {
      pm10: item.pm10Grade1h,
      pm25: item.pm25Grade1h,
      o3: item.o3Grade,
      no2: item.no2Grade,
      co: item.coGrade,
      so2: item.so2Grade,
    };

    return {
      city,
      source: 'airkorea',
      timestamp: now.toISOString(),
      pm10: reading('pm10', values.pm10, airKoreaGrade(codes.pm10, 'pm10', values.pm10)),
      pm25: reading('pm25', values.pm25, airKoreaGrade(codes.pm25, 'pm25', values.pm25)),
      o3: reading('o3', values.o3, airKoreaGrade(codes.o3, 'o3', values.o3)),
      no2: reading('no2', values.no2, airKoreaGrade(codes.no2, 'no2', values.no2)),
      co: reading('co', values.co, airKoreaGrade(codes.co, 'co', values.co)),
      so2: reading('so2', values.so2, airKoreaGrade(codes.so2, 'so2', values.so2)),
      air_quality_index: calculateAqi(values.pm10, values.pm25),
      station_name: item.stationName ?? '',
      latitude: null,
      longitude: null,
    };
  }

  async getFromWeatherApi(city: string, now: Date = new Date()): Promise<AirQualityReading | null> {
    if (!this.weatherApiClient.isConfigured) {
      return null;
    }
    const known = findCity(city);
    const result = await this.weatherApiClient
      .getAirQuality(known ? `${known.lat},${known.lon}` : city)
      .catch((error: unknown) => {
        this.logger.warn(`WeatherAPI air quality failed for ${city}: ${errorMessage(error)}`);
        return null;
      });
    if (!result) {
      return null;
    }

    const { air_quality: aq, location } = result;
    const usAqi = aq['us-epa-index'];
    if (usAqi === undefined) {
      return null;
    }
    const grade = usAqiToKorean(usAqi);
    // WeatherAPI reports every pollutant in μg/m³
    const measured = (value: number | undefined) => ({ value: value ?? 0, grade, unit: '㎍/㎥' });

    return {
      city,
      source: 'weatherapi',
      timestamp: now.toISOString(),
      pm10: measured(aq.pm10),
      pm25: measured(aq.pm2_5),
      o3: measured(aq.o3),
      no2: measured(aq.no2),
      co: measured(aq.co),
      so2: measured(aq.so2),
      air_quality_index: calculateAqi(aq.pm10 ?? 0, aq.pm2_5 ?? 0),
      station_name: `${city} WeatherAPI`,
      latitude: location.lat,
      longitude: location.lon,
    };
  }

  getBuiltIn(city: string, now: Date = new Date()): AirQualityReading | null {
    const values = BUILTIN_READINGS[city];
    if (!values) {
      return null;
    }
    return {
      city,
      source: 'builtin',
      timestamp: now.toISOString(),
      pm10: reading('pm10', values.pm10),
      pm25: reading('pm25', values.pm25),
      o3: reading('o3', values.o3),
      no2: reading('no2', values.no2),
      co: reading('co', values.co),
      so2: reading('so2', values.so2),
      air_quality_index: calculateAqi(values.pm10, values.pm25),
      station_name: `${city} 측정소`,
      latitude: null,
      longitude: null,
    };
  }

  async getForecast(city: string, now: Date = new Date()): Promise<AirQualityForecast> {
    if (this.isConfigured) {
      const items = await this.request<AirKoreaForecastItem>('ArpltnInforInqireSvc/getMinuDustFrcstDspth', {
        searchDate: seoulIsoDate(now),
        numOfRows: 100,
        pageNo: 1,
      });
      if (items) {
        return {
          city,
          source: 'airkorea',
          forecast_date: seoulIsoDate(now),
          forecasts: groupForecast(items, city),
        };
      }
    }

    return {
      city,
      source: 'builtin',
      forecast_date: seoulIsoDate(now),
      forecasts: Array.from({ length: 24 }, (_, hour) => ({
        date: seoulHourLabel(now, hour),
        pm10_grade: '보통',
        pm25_grade: '보통',
        pm10_value: 45,
        pm25_value: 25,
      })),
    };
  }

  /**
   * Stations within `radiusMeters`, nearest first.
   */
  async getNearbyStations(lat: number, lon: number, radiusMeters: number): Promise<MonitoringStation[]> {
    let candidates: Omit<MonitoringStation, 'distance'>[] = builtinStations;
    if (this.isConfigured) {
      const items = await this.request<AirKoreaStationItem>('MsrstnInfoInqireSvc/getMsrstnList', {
        numOfRows: 1000,
        pageNo: 1,
      });
      if (items) {
        candidates = items.map((item) => ({
          station_name: item.stationName ?? '',
          address: item.addr ?? '',
          latitude: parseMeasurement(item.dmX),
          longitude: parseMeasurement(item.dmY),
        }));
      }
    }

    return candidates
      .map((station) => ({
        ...station,
        distance: Math.round(haversineKm({ lat, lon }, { lat: station.latitude, lon: station.longitude }) * 1000),
      }))
      .filter((station) => station.distance <= radiusMeters)
      .sort((a, b) => a.distance - b.distance);
  }

  getSupportedCities(): string[] {
    return KMA_CITIES.map((city) => city.name);
  }

  // null on any failure so the caller can fall through to the next source
  private async request<TItem>(path: string, params: Record<string, string | number>): Promise<TItem[] | null> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<AirKoreaEnvelope<TItem>>(`${AIRKOREA_BASE_URL}/${path}`, {
          params: { serviceKey: this.publicDataApiKey, returnType: 'json', ...params },
          timeout: HTTP_TIMEOUT_MS,
        }),
      );
      const header = response.data.response?.header;
      if (header && header.resultCode !== '00') {
        this.logger.warn(`AirKorea ${path} returned ${header.resultCode}: ${header.resultMsg}`);
        return null;
      }
      return response.data.response?.body?.items ?? null;
    } catch (error) {
      this.logger.warn(`AirKorea ${path} failed: ${errorMessage(error)}`);
      return null;
    }
  }
}

function groupForecast(items: AirKoreaForecastItem[], region: string): AirQualityForecastEntry[] {
  const byDate = new Map<string, AirQualityForecastEntry>();
  for (const item of items) {
    const date = item.informData ?? '';
    const entry = byDate.get(date) ?? {
      date,
      pm10_grade: null,
      pm25_grade: null,
      pm10_value: null,
      pm25_value: null,
      overall: item.informOverall,
    };
    if (item.informCode === 'PM10') {
      entry.pm10_grade = regionGrade(item.informGrade, region);
    } else if (item.informCode === 'PM25') {
      entry.pm25_grade = regionGrade(item.informGrade, region);
    }
    byDate.set(date, entry);
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}
