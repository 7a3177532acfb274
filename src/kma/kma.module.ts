import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { WeatherApiModule } from '../weather/weather-api.module';
import { KmaController } from './kma.controller';
import { KmaService } from './kma.service';

@Module({
  imports: [HttpModule, WeatherApiModule],
  controllers: [KmaController],
  providers: [KmaService],
  exports: [KmaService],
})
export class KmaModule {}
