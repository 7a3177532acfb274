import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AttractionsController } from './attractions.controller';
import { TourismController } from './tourism.controller';
import { TourismService } from './tourism.service';

@Module({
  imports: [HttpModule],
  controllers: [TourismController, AttractionsController],
  providers: [TourismService],
})
export class TourismModule {}
