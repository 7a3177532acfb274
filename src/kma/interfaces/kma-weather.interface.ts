/**
 * data.go.kr envelope shared by the KMA services
 */
export interface KmaEnvelope<TItem> {
  response: {
    header: { resultCode: string; resultMsg: string };
    body?: {
      items?: { item?: TItem[] } | '';
      totalCount?: number;
    };
  };
}

export interface KmaObservationItem {
  baseDate: string;
  baseTime: string;
  category: string;
  nx: number;
  ny: number;
  obsrValue: string;
}

export interface KmaForecastItem {
  baseDate: string;
  baseTime: string;
  category: string;
  fcstDate: string;
  fcstTime: string;
  fcstValue: string;
  nx: number;
  ny: number;
}

export interface KmaMidForecastItem {
  tmFc?: string;
  wfSv?: string;
  rnSt?: string;
  taMax?: string;
  taMin?: string;
}

export interface KmaWarningItem {
  area?: string;
  warningType?: string;
  warningLevel?: string;
  warningMessage?: string;
  issueTime?: string;
  cancelTime?: string;
}

export interface KmaCurrentWeather {
  nx: number;
  ny: number;
  temperature: number;
  humidity: number;
  rainfall: number;
  wind_speed: number;
  wind_direction: string;
  wind_degree: number;
  precipitation_type: string;
  sky_condition: string;
  base_date: string;
  base_time: string;
  source: 'KMA';
}

export interface KmaDailyForecast {
  date: string;
  max_temp: number | null;
  min_temp: number | null;
  avg_temp: number | null;
  rainfall_probability: number;
  wind_speed: number;
  sky_condition: string;
}

export interface KmaShortForecast {
  nx: number;
  ny: number;
  base_date: string;
  base_time: string;
  forecast: KmaDailyForecast[];
  source: 'KMA';
}

export interface KmaMidForecast {
  reg_id: string;
  forecast: Array<{
    date: string;
    weather: string;
    rainfall_probability: number;
    max_temp: number;
    min_temp: number;
  }>;
}

export interface KmaWarnings {
  area: string;
  warnings: Array<{
    area: string;
    warning_type: string;
    warning_level: string;
    warning_message: string;
    issue_time: string;
    cancel_time: string;
  }>;
}
