import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import { CoordinatesQueryDto } from '../../common/dto/coordinates.dto';
import { TRAVEL_MODES, TravelMode } from '../map.constants';

export class SearchQueryDto {
  @ApiProperty({ example: '경복궁' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiPropertyOptional({ minimum: 1, maximum: 30, default: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(30)
  display?: number;
}

export class NearbyQueryDto extends CoordinatesQueryDto {
  @ApiPropertyOptional({ minimum: 100, maximum: 10000, default: 1000, description: 'metres' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(100)
  @Max(10000)
  radius?: number;
}

export class NearbySearchQueryDto extends NearbyQueryDto {
  @ApiProperty({ example: '카페' })
  @IsString()
  @IsNotEmpty()
  query!: string;
}

export class GeocodeQueryDto {
  @ApiProperty({ example: '서울특별시 종로구 사직로 161' })
  @IsString()
  @IsNotEmpty()
  address!: string;
}

export class RouteQueryDto {
  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  start_lat!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  start_lon!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  end_lat!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  end_lon!: number;

  @ApiPropertyOptional({ enum: TRAVEL_MODES, default: 'driving' })
  @IsOptional()
  @IsIn(TRAVEL_MODES)
  mode?: TravelMode;
}

export class MapViewQueryDto extends CoordinatesQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  zoom?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(200)
  @Max(1200)
  width?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(200)
  @Max(800)
  height?: number;
}
