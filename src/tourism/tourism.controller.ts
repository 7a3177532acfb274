import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { EventsQueryDto } from './dto/events-query.dto';
import { TourismService } from './tourism.service';

@ApiTags('events')
@Controller('events')
export class TourismController {
  constructor(private readonly tourismService: TourismService) {}

  /**
   * Festivals in an area starting on or after `start_date`.
   */
  @Get(':areaCode')
  getEvents(@Param('areaCode') areaCode: string, @Query() query: EventsQueryDto) {
    return this.tourismService.getFestivals(areaCode, query.start_date);
  }
}
