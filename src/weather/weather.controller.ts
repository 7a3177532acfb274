import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { CountryQueryDto, ForecastQueryDto, WeatherRequestDto } from './dto/weather-request.dto';
import { DEFAULT_FORECAST_DAYS, SUPPORTED_CITIES } from './weather.constants';
import { WeatherService } from './weather.service';

@ApiTags('weather')
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherService: WeatherService) {}

  @Get()
  getInfo() {
    return {
      message: 'Weather API endpoint',
      provider: 'WeatherAPI',
      fallback: ['KMA', 'static'],
      endpoints: [
        'POST /weather/current',
        'GET /weather/current/:city',
        'GET /weather/forecast/:city',
        'GET /weather/cities',
        'GET /weather/favorites',
      ],
    };
  }

  @Post('current')
  @HttpCode(HttpStatus.OK)
  getCurrent(@Body() dto: WeatherRequestDto) {
    return this.weatherService.getCurrentWeather(dto.city, dto.country);
  }

  @Get('current/:city')
  getCurrentByCity(@Param('city') city: string, @Query() query: CountryQueryDto) {
    return this.weatherService.getCurrentWeather(city, query.country);
  }

  @Get('forecast/:city')
  getForecast(@Param('city') city: string, @Query() query: ForecastQueryDto) {
    return this.weatherService.getForecast(city, query.days ?? DEFAULT_FORECAST_DAYS, query.country);
  }

  @Get('cities')
  getCities() {
    return {
      cities: SUPPORTED_CITIES.map(({ name, country, korean_name }) => ({ name, country, korean_name })),
    };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Get('favorites')
  async getFavorites(@Request() req: AuthenticatedRequest) {
    return { favorites: await this.weatherService.getFavorites(req.user.userId) };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Get('favorites/weather')
  async getFavoritesWeather(@Request() req: AuthenticatedRequest) {
    return { favorites_weather: await this.weatherService.getFavoritesWeather(req.user.userId) };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Post('favorites/:city')
  async addFavorite(@Request() req: AuthenticatedRequest, @Param('city') city: string) {
    const favorites = await this.weatherService.addFavorite(req.user.userId, city);
    return { message: `${city}을(를) 즐겨찾기에 추가했습니다.`, favorites };
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Delete('favorites/:city')
  async removeFavorite(@Request() req: AuthenticatedRequest, @Param('city') city: string) {
    const favorites = await this.weatherService.removeFavorite(req.user.userId, city);
    return { message: `${city}을(를) 즐겨찾기에서 삭제했습니다.`, favorites };
  }
}
