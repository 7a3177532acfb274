import { Module } from '@nestjs/common';
import { KmaModule } from '../kma/kma.module';
import { UserModule } from '../user/user.module';
import { WeatherApiModule } from './weather-api.module';
import { WeatherController } from './weather.controller';
import { WeatherService } from './weather.service';

@Module({
  imports: [WeatherApiModule, KmaModule, UserModule],
  controllers: [WeatherController],
  providers: [WeatherService],
})
export class WeatherModule {}
