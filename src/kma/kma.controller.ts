import { Controller, Get, Logger, Param, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CoordinatesQueryDto } from '../common/dto/coordinates.dto';
import { errorMessage } from '../common/utils/http-error.util';
import { WeatherResponse } from '../weather/interfaces/weather.interface';
import { WeatherApiClient } from '../weather/weather-api.client';
import { KmaCurrentWeather } from './interfaces/kma-weather.interface';
import { KmaService } from './kma.service';
import { getNearestCity, latLonToGrid, validateCoordinates } from './kma.utils';

@ApiTags('kma')
@Controller('kma')
export class KmaController {
  private readonly logger = new Logger(KmaController.name);

  constructor(
    private readonly kmaService: KmaService,
    private readonly weatherApiClient: WeatherApiClient,
  ) {}

  @Get('provinces')
  getProvinces() {
    return { provinces: this.kmaService.getProvinces() };
  }

  @Get('cities')
  getCities() {
    return {
      cities: this.kmaService.getCities().map((city) => ({
        name: city.name,
        province: city.province,
        nx: city.nx,
        ny: city.ny,
      })),
    };
  }

  @Get('current/all-cities')
  async getAllCitiesCurrent() {
    const results = await this.kmaService.getAllCitiesCurrent();
    return { results, total: results.length };
  }

  @Get('current/by-province/:province')
  getCurrentByProvince(@Param('province') province: string) {
    return this.kmaService.getCurrentByProvince(province);
  }

  @Get('current/:city')
  async getCurrent(@Param('city') city: string) {
    const weather = await this.kmaService.getCurrentWeatherByCity(city);
    return { city, weather };
  }

  @Get('forecast/short/:city')
  async getShortForecast(@Param('city') cityName: string) {
    const city = this.kmaService.getSupportedCity(cityName);
    return { city: city.name, ...(await this.kmaService.getShortForecast(city.nx, city.ny)) };
  }

  @Get('forecast/mid/:city')
  async getMidForecast(@Param('city') cityName: string) {
    const city = this.kmaService.getSupportedCity(cityName);
    return { city: city.name, ...(await this.kmaService.getMidForecast(city.midRegionCode)) };
  }

  @Get('warning/:area')
  getWarnings(@Param('area') area: string) {
    return this.kmaService.getWarnings(area);
  }

  /**
   * KMA and WeatherAPI side by side; a failing source is reported as null.
   */
  @Get('compare/:city')
  async compare(@Param('city') cityName: string) {
    const city = this.kmaService.getSupportedCity(cityName);
    const [kma, weatherApi] = await Promise.all([
      this.kmaService.getCurrentWeather(city.nx, city.ny).catch((error: unknown): KmaCurrentWeather | null => {
        this.logFailure('kma', city.name, error);
        return null;
      }),
      this.weatherApiClient
        .getCurrent(`${city.lat},${city.lon}`)
        .catch((error: unknown): WeatherResponse | null => {
          this.logFailure('weatherapi', city.name, error);
          return null;
        }),
    ]);
    return { city: city.name, kma, weatherapi: weatherApi };
  }

  @Get('coordinates/:city')
  getCoordinates(@Param('city') cityName: string) {
    const city = this.kmaService.getSupportedCity(cityName);
    return {
      city: city.name,
      province: city.province,
      nx: city.nx,
      ny: city.ny,
      latitude: city.lat,
      longitude: city.lon,
      valid: validateCoordinates(city.nx, city.ny),
    };
  }

  @Get('grid')
  getGrid(@Query() { lat, lon }: CoordinatesQueryDto) {
    const { nx, ny } = latLonToGrid(lat, lon);
    const nearest = getNearestCity(nx, ny);
    return {
      latitude: lat,
      longitude: lon,
      nx,
      ny,
      valid: validateCoordinates(nx, ny),
      nearest_city: { name: nearest.name, province: nearest.province, nx: nearest.nx, ny: nearest.ny },
    };
  }

  private logFailure(source: string, city: string, error: unknown): void {
    this.logger.warn(`compare: ${source} failed for ${city}: ${errorMessage(error)}`);
  }
}
