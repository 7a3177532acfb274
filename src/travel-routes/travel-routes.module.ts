import { Module } from '@nestjs/common';
import { MapModule } from '../map/map.module';
import { TravelPlansModule } from '../travel-plans/travel-plans.module';
import { TravelRoutesController } from './travel-routes.controller';
import { TravelRoutesService } from './travel-routes.service';

@Module({
  imports: [TravelPlansModule, MapModule],
  controllers: [TravelRoutesController],
  providers: [TravelRoutesService],
})
export class TravelRoutesModule {}
