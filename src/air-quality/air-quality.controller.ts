import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { ResourceNotFoundException } from '../common/exceptions/app.exception';
import { GRADE_COLORS, GRADE_DESCRIPTIONS, GRADES, HEALTH_ADVICE, POLLUTANT_INFO } from './air-quality.constants';
import { AirQualityService } from './air-quality.service';
import { NearbyStationsQueryDto } from './dto/nearby-stations.dto';
import { AirQualityReading } from './interfaces/air-quality.interface';

const DEFAULT_STATION_RADIUS = 5000;

@ApiTags('air-quality')
@Controller('air-quality')
export class AirQualityController {
  constructor(private readonly airQualityService: AirQualityService) {}

  @Get('current/:city')
  getCurrent(@Param('city') city: string) {
    return this.requireCurrent(city);
  }

  @Get('forecast/:city')
  getForecast(@Param('city') city: string) {
    return this.airQualityService.getForecast(city);
  }

  @Get('stations/nearby')
  async getNearbyStations(@Query() query: NearbyStationsQueryDto) {
    const radius = query.radius ?? DEFAULT_STATION_RADIUS;
    const stations = await this.airQualityService.getNearbyStations(query.lat, query.lon, radius);
    return {
      stations,
      total: stations.length,
      center: { latitude: query.lat, longitude: query.lon },
      radius,
    };
  }

  @Get('cities')
  getCities() {
    return { cities: this.airQualityService.getSupportedCities() };
  }

  @Get('info')
  getInfo() {
    return {
      description: '대기질 정보 API',
      sources: [
        { name: 'airkorea', description: '환경부 에어코리아 실시간 측정 정보', priority: 1 },
        { name: 'weatherapi', description: 'WeatherAPI 대기질 정보', priority: 2 },
        { name: 'builtin', description: '기본 대기질 정보 (API 키 없을 때)', priority: 3 },
      ],
      pollutants: POLLUTANT_INFO,
      grades: Object.fromEntries(
        GRADES.map((grade) => [grade, { color: GRADE_COLORS[grade], description: GRADE_DESCRIPTIONS[grade] }]),
      ),
    };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Get('health/:city')
  async getHealthAdvice(@Param('city') city: string) {
    const current = await this.requireCurrent(city);
    const grade = current.air_quality_index.grade;
    return {
      city,
      air_quality_grade: grade,
      timestamp: current.timestamp,
      health_advice: HEALTH_ADVICE[grade],
      current_data: current,
    };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Get('compare/:city')
  async compare(@Param('city') city: string) {
    const now = new Date();
    const [airkorea, weatherapi] = await Promise.all([
      this.airQualityService.getFromAirKorea(city, now),
      this.airQualityService.getFromWeatherApi(city, now),
    ]);
    const builtin = this.airQualityService.getBuiltIn(city, now);
    const sources = { airkorea, weatherapi, builtin };
    const available = Object.entries(sources).filter(([, data]) => data !== null);

    return {
      city,
      timestamp: now.toISOString(),
      sources,
      summary: {
        available_sources: available.length,
        primary_source: available.length > 0 ? available[0][0] : null,
      },
    };
  }

  private async requireCurrent(city: string): Promise<AirQualityReading> {
    const current = await this.airQualityService.getCurrent(city);
    if (!current) {
      throw new ResourceNotFoundException(`'${city}'의 대기질 정보를 찾을 수 없습니다.`);
    }
    return current;
  }
}
