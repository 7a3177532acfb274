import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { AirQualityModule } from './air-quality/air-quality.module';
import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { ChatbotModule } from './chatbot/chatbot.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { KmaModule } from './kma/kma.module';
import { MapModule } from './map/map.module';
import { RecommendationsModule } from './recommendations/recommendations.module';
import { TourismModule } from './tourism/tourism.module';
import { TravelPlansModule } from './travel-plans/travel-plans.module';
import { TravelRoutesModule } from './travel-routes/travel-routes.module';
import { UserModule } from './user/user.module';
import { WeatherModule } from './weather/weather.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    DatabaseModule,
    AuthModule,
    UserModule,
    WeatherModule,
    KmaModule,
    AirQualityModule,
    MapModule,
    TourismModule,
    ChatbotModule,
    TravelPlansModule,
    TravelRoutesModule,
    RecommendationsModule,
  ],
  controllers: [AppController],
  providers: [
    { provide: APP_FILTER, useClass: AllExceptionsFilter },
    { provide: APP_INTERCEPTOR, useClass: LoggingInterceptor },
  ],
})
export class AppModule {}
