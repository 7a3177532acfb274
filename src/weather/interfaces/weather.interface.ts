export interface WeatherLocation {
  city: string;
  country: string;
  region: string;
  timezone: string;
  local_time: string;
}

export interface CurrentWeather {
  temperature: number;
  feels_like: number;
  condition: string;
  description: string;
  icon: string;
  humidity: number;
  wind_speed: number;
  wind_direction: number;
  pressure: number | null;
  visibility: number | null;
  uv_index: number | null;
}

export interface DailyForecast {
  date: string;
  temperature_max: number;
  temperature_min: number;
  condition: string;
  description: string;
  icon: string;
  humidity: number;
  wind_speed: number;
  precipitation_chance: number;
}

export type WeatherSource = 'weatherapi' | 'kma' | 'fallback';

export interface WeatherResponse {
  location: WeatherLocation;
  current: CurrentWeather;
  source: WeatherSource;
}

export interface ForecastResponse extends WeatherResponse {
  forecast: DailyForecast[];
}
