import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ok } from '../common/utils/api-response';
import { AttractionSearchQueryDto, AttractionsByRegionQueryDto } from './dto/attractions-query.dto';
import { TourismService } from './tourism.service';

@ApiTags('attractions')
@Controller('attractions')
export class AttractionsController {
  constructor(private readonly tourismService: TourismService) {}

  @Get('search')
  async search(@Query() query: AttractionSearchQueryDto) {
    return ok({ suggestions: await this.tourismService.searchAttractions(query.query, query.limit) });
  }

  @Get('by-region')
  async byRegion(@Query() query: AttractionsByRegionQueryDto) {
    return ok(await this.tourismService.getAttractionsByRegion(query.region_code, query.limit));
  }

  @Get(':contentId')
  async get(@Param('contentId') contentId: string) {
    return ok(await this.tourismService.getAttraction(contentId));
  }
}
