import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { CoordinatesQueryDto } from '../../common/dto/coordinates.dto';

export class NearbyStationsQueryDto extends CoordinatesQueryDto {
  @ApiPropertyOptional({ minimum: 1000, maximum: 50000, default: 5000, description: 'metres' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1000)
  @Max(50000)
  radius?: number;
}
