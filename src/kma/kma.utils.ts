import { roundTo } from '../common/utils/geo.util';
import { seoulDateString, seoulHour } from '../common/utils/date.util';
import {
  AREA_CODES,
  BASE_TIME_SCHEDULE,
  GRID_BOUNDS,
  KMA_CITIES,
  KmaCity,
  LCC,
  PRECIPITATION_TYPES,
  SKY_CONDITIONS,
  WIND_DIRECTIONS,
} from './kma.constants';
import {
  KmaCurrentWeather,
  KmaDailyForecast,
  KmaForecastItem,
  KmaObservationItem,
} from './interfaces/kma-weather.interface';

export interface BaseDateTime {
  baseDate: string;
  baseTime: string;
}

/**
 * Latest published base_date/base_time at `now` (Asia/Seoul).
 * Before 02:00 the newest release is the previous day's 23:00.
 */
export function getBaseDateTime(now: Date): BaseDateTime {
  const hour = seoulHour(now);
  for (const [releaseHour, baseTime] of BASE_TIME_SCHEDULE) {
    if (hour >= releaseHour) {
      return { baseDate: seoulDateString(now), baseTime };
    }
  }
  return { baseDate: seoulDateString(now, -1), baseTime: '2300' };
}

export function precipitationLabel(code: string): string {
  return PRECIPITATION_TYPES[code] ?? '알 수 없음';
}

export function windDirectionLabel(degrees: number): string {
  return WIND_DIRECTIONS[Math.floor((degrees + 22.5) / 45) % 8];
}

const toNumber = (value: string): number => {
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? 0 : parsed;
};

// PCP/RN1 are strings such as "강수없음", "1mm 미만" or "2.5mm"
const toRainfall = (value: string): number => (value === '강수없음' ? 0 : roundTo(toNumber(value), 1));

export function parseObservation(items: KmaObservationItem[]): Omit<KmaCurrentWeather, 'nx' | 'ny' | 'base_date' | 'base_time' | 'source'> {
  const weather = {
    temperature: 0,
    humidity: 0,
    rainfall: 0,
    wind_speed: 0,
    wind_direction: '',
    wind_degree: 0,
    precipitation_type: '없음',
    sky_condition: '맑음',
  };

  for (const item of items) {
    const value = item.obsrValue;
    switch (item.category) {
      case 'T1H':
        weather.temperature = roundTo(toNumber(value), 1);
        break;
      case 'RN1':
      case 'PCP':
        weather.rainfall = toRainfall(value);
        break;
      case 'REH':
        weather.humidity = Math.trunc(toNumber(value));
        break;
      case 'WSD':
        weather.wind_speed = roundTo(toNumber(value), 1);
        break;
      case 'PTY':
        weather.precipitation_type = precipitationLabel(value);
        break;
      case 'VEC':
        weather.wind_degree = toNumber(value);
        weather.wind_direction = windDirectionLabel(weather.wind_degree);
        break;
      default:
        break;
    }
  }

  if (weather.precipitation_type !== '없음' && weather.precipitation_type !== '알 수 없음') {
    weather.sky_condition = weather.precipitation_type;
  }
  return weather;
}

/**
 * Folds village-forecast items into one summary per date, in date order.
 */
export function summarizeForecast(items: KmaForecastItem[]): KmaDailyForecast[] {
  const byDate = new Map<string, Map<string, Record<string, string>>>();
  for (const item of items) {
    let times = byDate.get(item.fcstDate);
    if (!times) {
      times = new Map();
      byDate.set(item.fcstDate, times);
    }
    const slot = times.get(item.fcstTime) ?? {};
    slot[item.category] = item.fcstValue;
    times.set(item.fcstTime, slot);
  }

  return [...byDate.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, times]) => {
      const temps: number[] = [];
      let rainfallProbability = 0;
      let windSpeed = 0;

      for (const slot of times.values()) {
        if (slot.TMP !== undefined) temps.push(toNumber(slot.TMP));
        if (slot.POP !== undefined) rainfallProbability = Math.max(rainfallProbability, Math.trunc(toNumber(slot.POP)));
        if (slot.WSD !== undefined) windSpeed = Math.max(windSpeed, toNumber(slot.WSD));
      }

      const representative = times.get('1200') ?? [...times.values()][0];
      const precipitation = representative.PTY !== undefined ? precipitationLabel(representative.PTY) : '없음';
      const sky =
        precipitation !== '없음' && precipitation !== '알 수 없음'
          ? precipitation
          : SKY_CONDITIONS[representative.SKY ?? ''] ?? '맑음';

      return {
        date,
        max_temp: temps.length > 0 ? Math.max(...temps) : null,
        min_temp: temps.length > 0 ? Math.min(...temps) : null,
        avg_temp: temps.length > 0 ? roundTo(temps.reduce((sum, t) => sum + t, 0) / temps.length, 1) : null,
        rainfall_probability: rainfallProbability,
        wind_speed: windSpeed,
        sky_condition: sky,
      };
    });
}

export function validateCoordinates(nx: number, ny: number): boolean {
  return (
    nx >= GRID_BOUNDS.nxMin && nx <= GRID_BOUNDS.nxMax && ny >= GRID_BOUNDS.nyMin && ny <= GRID_BOUNDS.nyMax
  );
}

export function findCity(name: string): KmaCity | undefined {
  return KMA_CITIES.find((city) => city.name === name);
}

export function getNearestCity(nx: number, ny: number): KmaCity {
  let nearest = KMA_CITIES[0];
  let best = Number.POSITIVE_INFINITY;
  for (const city of KMA_CITIES) {
    const distance = Math.hypot(city.nx - nx, city.ny - ny);
    if (distance < best) {
      best = distance;
      nearest = city;
    }
  }
  return nearest;
}

/**
 * TourAPI area code for a city or province name; cities fall back to their province.
 */
export function getAreaCode(name: string): string | undefined {
  const direct = AREA_CODES[name];
  if (direct) {
    return direct;
  }
  const city = findCity(name);
  return city ? AREA_CODES[city.province] : undefined;
}

/**
 * WGS84 latitude/longitude to the KMA forecast grid.
 */
export function latLonToGrid(lat: number, lon: number): { nx: number; ny: number } {
  const DEGRAD = Math.PI / 180;
  const re = LCC.earthRadiusKm / LCC.gridKm;
  const slat1 = LCC.standardLat1 * DEGRAD;
  const slat2 = LCC.standardLat2 * DEGRAD;
  const olon = LCC.originLon * DEGRAD;
  const olat = LCC.originLat * DEGRAD;

  let sn = Math.tan(Math.PI * 0.25 + slat2 * 0.5) / Math.tan(Math.PI * 0.25 + slat1 * 0.5);
  sn = Math.log(Math.cos(slat1) / Math.cos(slat2)) / Math.log(sn);
  let sf = Math.tan(Math.PI * 0.25 + slat1 * 0.5);
  sf = (Math.pow(sf, sn) * Math.cos(slat1)) / sn;
  let ro = Math.tan(Math.PI * 0.25 + olat * 0.5);
  ro = (re * sf) / Math.pow(ro, sn);

  let ra = Math.tan(Math.PI * 0.25 + lat * DEGRAD * 0.5);
  ra = (re * sf) / Math.pow(ra, sn);
  let theta = lon * DEGRAD - olon;
  if (theta > Math.PI) theta -= 2 * Math.PI;
  if (theta < -Math.PI) theta += 2 * Math.PI;
  theta *= sn;

  return {
    nx: Math.floor(ra * Math.sin(theta) + LCC.originX + 0.5),
    ny: Math.floor(ro - ra * Math.cos(theta) + LCC.originY + 0.5),
  };
}
