export type AirGrade = '좋음' | '보통' | '나쁨' | '매우나쁨';

export type Pollutant = 'pm10' | 'pm25' | 'o3' | 'no2' | 'co' | 'so2';

export type AirQualitySource = 'airkorea' | 'weatherapi' | 'builtin';

export interface PollutantReading {
  value: number;
  grade: AirGrade;
  unit: string;
}

export interface AirQualityIndex {
  value: number;
  grade: AirGrade;
  color: string;
}

export type PollutantReadings = Record<Pollutant, PollutantReading>;

export interface AirQualityReading extends PollutantReadings {
  city: string;
  source: AirQualitySource;
  timestamp: string;
  air_quality_index: AirQualityIndex;
  station_name: string;
  latitude: number | null;
  longitude: number | null;
}

export interface AirQualityForecastEntry {
  date: string;
  pm10_grade: string | null;
  pm25_grade: string | null;
  pm10_value: number | null;
  pm25_value: number | null;
  overall?: string;
}

export interface AirQualityForecast {
  city: string;
  source: Exclude<AirQualitySource, 'weatherapi'>;
  forecast_date: string;
  forecasts: AirQualityForecastEntry[];
}

export interface MonitoringStation {
  station_name: string;
  address: string;
  latitude: number;
  longitude: number;
  distance: number;
}

export interface HealthAdvice {
  general: string;
  sensitive_groups: string;
  activities: string[];
  recommendations: string[];
}

/** AirKorea (data.go.kr B552584) item shapes, values arrive as strings. */
export interface AirKoreaMeasurementItem {
  stationName?: string;
  dataTime?: string;
  pm10Value?: string;
  pm25Value?: string;
  o3Value?: string;
  no2Value?: string;
  coValue?: string;
  so2Value?: string;
  pm10Grade1h?: string;
  pm25Grade1h?: string;
  o3Grade?: string;
  no2Grade?: string;
  coGrade?: string;
  so2Grade?: string;
}

export interface AirKoreaForecastItem {
  informCode?: string;
  informData?: string;
  informGrade?: string;
  informOverall?: string;
  dataTime?: string;
}

export interface AirKoreaStationItem {
  stationName?: string;
  addr?: string;
  dmX?: string;
  dmY?: string;
}

export interface AirKoreaEnvelope<TItem> {
  response?: {
    header?: { resultCode: string; resultMsg: string };
    body?: { items?: TItem[]; totalCount?: number };
  };
}
