/**
 * Subset of the WeatherAPI.com current.json / forecast.json payloads that we read.
 */
export interface WeatherApiLocation {
  name: string;
  region: string;
  country: string;
  lat: number;
  lon: number;
  tz_id: string;
  localtime: string;
}

export interface WeatherApiCondition {
  text: string;
  icon: string;
  code: number;
}

export interface WeatherApiAirQuality {
  co?: number;
  no2?: number;
  o3?: number;
  so2?: number;
  pm2_5?: number;
  pm10?: number;
  'us-epa-index'?: number;
}

export interface WeatherApiCurrent {
  temp_c: number;
  feelslike_c: number;
  condition: WeatherApiCondition;
  humidity: number;
  wind_kph: number;
  wind_degree: number;
  pressure_mb: number;
  vis_km: number;
  uv: number;
  air_quality?: WeatherApiAirQuality;
}

export interface WeatherApiForecastDay {
  date: string;
  day: {
    maxtemp_c: number;
    mintemp_c: number;
    avghumidity: number;
    maxwind_kph: number;
    daily_chance_of_rain: number;
    condition: WeatherApiCondition;
  };
}

export interface WeatherApiCurrentResponse {
  location: WeatherApiLocation;
  current: WeatherApiCurrent;
}

export interface WeatherApiForecastResponse extends WeatherApiCurrentResponse {
  forecast: { forecastday: WeatherApiForecastDay[] };
}
