export interface SupportedCity {
  name: string;
  country: string;
  korean_name: string;
  timezone: string;
}

export const SUPPORTED_CITIES: readonly SupportedCity[] = [
  { name: 'Seoul', country: 'KR', korean_name: '서울', timezone: 'Asia/Seoul' },
  { name: 'Busan', country: 'KR', korean_name: '부산', timezone: 'Asia/Seoul' },
  { name: 'Incheon', country: 'KR', korean_name: '인천', timezone: 'Asia/Seoul' },
  { name: 'Daegu', country: 'KR', korean_name: '대구', timezone: 'Asia/Seoul' },
  { name: 'Daejeon', country: 'KR', korean_name: '대전', timezone: 'Asia/Seoul' },
  { name: 'Gwangju', country: 'KR', korean_name: '광주', timezone: 'Asia/Seoul' },
  { name: 'Tokyo', country: 'JP', korean_name: '도쿄', timezone: 'Asia/Tokyo' },
  { name: 'Osaka', country: 'JP', korean_name: '오사카', timezone: 'Asia/Tokyo' },
  { name: 'New York', country: 'US', korean_name: '뉴욕', timezone: 'America/New_York' },
  { name: 'Los Angeles', country: 'US', korean_name: '로스앤젤레스', timezone: 'America/Los_Angeles' },
  { name: 'London', country: 'GB', korean_name: '런던', timezone: 'Europe/London' },
  { name: 'Paris', country: 'FR', korean_name: '파리', timezone: 'Europe/Paris' },
  { name: 'Berlin', country: 'DE', korean_name: '베를린', timezone: 'Europe/Berlin' },
  { name: 'Sydney', country: 'AU', korean_name: '시드니', timezone: 'Australia/Sydney' },
  { name: 'Toronto', country: 'CA', korean_name: '토론토', timezone: 'America/Toronto' },
];

export const DEFAULT_FORECAST_DAYS = 7;

/** Matches either the English or the Korean name, case-insensitively. */
export function findSupportedCity(name: string): SupportedCity | undefined {
  const needle = name.trim().toLowerCase();
  return SUPPORTED_CITIES.find((city) => city.name.toLowerCase() === needle || city.korean_name === needle);
}
