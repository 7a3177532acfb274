import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { WeatherApiModule } from '../weather/weather-api.module';
import { AirQualityController } from './air-quality.controller';
import { AirQualityService } from './air-quality.service';

@Module({
  imports: [HttpModule, WeatherApiModule],
  controllers: [AirQualityController],
  providers: [AirQualityService],
  exports: [AirQualityService],
})
export class AirQualityModule {}
