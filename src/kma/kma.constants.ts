import areaCodes from './data/area-codes.json';
import cities from './data/cities.json';

export const KMA_BASE_URL = 'http://apis.data.go.kr/1360000';

export interface KmaCity {
  name: string;
  province: string;
  nx: number;
  ny: number;
  lat: number;
  lon: number;
  midRegionCode: string;
}

export const KMA_CITIES: readonly KmaCity[] = cities;

export const AREA_CODES: Readonly<Record<string, string>> = areaCodes;

export const PROVINCE_CITIES: Readonly<Record<string, string[]>> = KMA_CITIES.reduce<Record<string, string[]>>(
  (acc, city) => {
    if (!acc[city.province]) {
      acc[city.province] = [];
    }
    acc[city.province].push(city.name);
    return acc;
  },
  {},
);

export const PRECIPITATION_TYPES: Readonly<Record<string, string>> = {
  '0': '없음',
  '1': '비',
  '2': '비/눈',
  '3': '눈',
  '4': '소나기',
};

export const SKY_CONDITIONS: Readonly<Record<string, string>> = {
  '1': '맑음',
  '3': '구름많음',
  '4': '흐림',
};

export const WIND_DIRECTIONS = ['북', '북동', '동', '남동', '남', '남서', '서', '북서'] as const;

// Release hours of the village forecast, latest first
export const BASE_TIME_SCHEDULE: ReadonlyArray<[hour: number, baseTime: string]> = [
  [23, '2300'],
  [20, '2000'],
  [17, '1700'],
  [14, '1400'],
  [11, '1100'],
  [8, '0800'],
  [5, '0500'],
  [2, '0200'],
];

// Lambert conformal conic parameters of the KMA 5 km grid
export const LCC = {
  earthRadiusKm: 6371.00877,
  gridKm: 5.0,
  standardLat1: 30.0,
  standardLat2: 60.0,
  originLon: 126.0,
  originLat: 38.0,
  originX: 43,
  originY: 136,
} as const;

export const GRID_BOUNDS = { nxMin: 50, nxMax: 150, nyMin: 30, nyMax: 150 } as const;
