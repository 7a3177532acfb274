import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { WeatherApiClient } from './weather-api.client';

@Module({
  imports: [HttpModule],
  providers: [WeatherApiClient],
  exports: [WeatherApiClient],
})
export class WeatherApiModule {}
