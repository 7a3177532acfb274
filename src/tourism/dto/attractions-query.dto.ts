import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';

export class AttractionSearchQueryDto {
  @ApiProperty({ example: '경복궁', description: '두 글자 미만이면 빈 목록' })
  @IsString()
  query!: string;

  @ApiPropertyOptional({ default: 10, minimum: 1, maximum: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  limit: number = 10;
}

export class AttractionsByRegionQueryDto {
  @ApiProperty({ example: '11', description: '행정구역 코드(11, 11000000), TourAPI 지역 코드 또는 지역명' })
  @IsString()
  @IsNotEmpty()
  region_code!: string;

  @ApiPropertyOptional({ default: 100, minimum: 1, maximum: 500 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit: number = 100;
}
