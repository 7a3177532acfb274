import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsDefined,
  IsIn,
  IsInt,
  IsMongoId,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { CoordinatesQueryDto } from '../../common/dto/coordinates.dto';
import { TRAVEL_MODES, TravelMode } from '../../map/map.constants';

const CLOCK_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export class RouteEndpointsDto {
  @ApiProperty({ type: CoordinatesQueryDto })
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesQueryDto)
  origin!: CoordinatesQueryDto;

  @ApiProperty({ type: CoordinatesQueryDto })
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesQueryDto)
  destination!: CoordinatesQueryDto;
}

export class CalculateRouteDto extends RouteEndpointsDto {
  @ApiPropertyOptional({ enum: TRAVEL_MODES, default: 'driving' })
  @IsOptional()
  @IsIn(TRAVEL_MODES)
  mode?: TravelMode;
}

export class CreateTravelRouteDto {
  @ApiProperty()
  @IsMongoId()
  planId!: string;

  @ApiProperty({ example: 'place-1' })
  @IsString()
  originPlaceId!: string;

  @ApiProperty({ example: 'place-2' })
  @IsString()
  destinationPlaceId!: string;

  @ApiProperty({ minimum: 1 })
  @IsInt()
  @Min(1)
  routeOrder!: number;

  @ApiProperty({ enum: TRAVEL_MODES })
  @IsIn(TRAVEL_MODES)
  transportMode!: TravelMode;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  durationMinutes?: number;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  distanceKm?: number;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  routeData?: Record<string, unknown>;
}

export class UpdateTravelRouteDto extends PartialType(OmitType(CreateTravelRouteDto, ['planId'] as const)) {}

export class RouteStopDto {
  @ApiProperty({ example: 'place-1' })
  @IsString()
  place_id!: string;

  @ApiProperty({ example: 37.5665 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @ApiProperty({ example: 126.978 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;
}

export class AutoGenerateRoutesDto {
  @ApiProperty({ type: [RouteStopDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @ArrayMinSize(2)
  @Type(() => RouteStopDto)
  stops!: RouteStopDto[];

  @ApiPropertyOptional({ enum: TRAVEL_MODES, default: 'driving' })
  @IsOptional()
  @IsIn(TRAVEL_MODES)
  mode?: TravelMode;
}

export class RoutePreferencesDto {
  @ApiPropertyOptional({ description: '비용 우선' })
  @IsOptional()
  @IsBoolean()
  prefer_cost?: boolean;

  @ApiPropertyOptional({ description: '속도 우선' })
  @IsOptional()
  @IsBoolean()
  prefer_speed?: boolean;

  @ApiPropertyOptional({ description: '친환경 이동 우선' })
  @IsOptional()
  @IsBoolean()
  prefer_eco?: boolean;
}

export class RecommendRouteDto extends RouteEndpointsDto {
  @ApiPropertyOptional({ type: RoutePreferencesDto })
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => RoutePreferencesDto)
  preferences?: RoutePreferencesDto;
}

export class OpeningHoursDto {
  @ApiProperty({ example: '09:00' })
  @Matches(CLOCK_PATTERN)
  open!: string;

  @ApiProperty({ example: '18:00' })
  @Matches(CLOCK_PATTERN)
  close!: string;
}

export class OptimizePlaceDto {
  @ApiProperty({ example: 'place-1' })
  @IsString()
  id!: string;

  @ApiProperty({ example: '경복궁' })
  @IsString()
  name!: string;

  @ApiProperty({ example: 37.5796 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @ApiProperty({ example: 126.977 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @ApiPropertyOptional({ default: 120, description: '체류 시간(분)' })
  @IsOptional()
  @IsInt()
  @Min(0)
  duration_minutes?: number;

  @ApiPropertyOptional({ default: 1, minimum: 0, maximum: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  priority?: number;

  @ApiPropertyOptional({ type: OpeningHoursDto })
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => OpeningHoursDto)
  opening_hours?: OpeningHoursDto;
}

export class OptimizeDailyRouteDto {
  @ApiProperty({ type: [OptimizePlaceDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @ArrayMinSize(1)
  @Type(() => OptimizePlaceDto)
  places!: OptimizePlaceDto[];

  @ApiPropertyOptional({ type: CoordinatesQueryDto, description: '숙소 등 출발 위치' })
  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => CoordinatesQueryDto)
  start?: CoordinatesQueryDto;

  @ApiPropertyOptional({ example: '09:00', default: '09:00' })
  @IsOptional()
  @Matches(CLOCK_PATTERN)
  start_time?: string;

  @ApiPropertyOptional({ enum: TRAVEL_MODES, default: 'transit' })
  @IsOptional()
  @IsIn(TRAVEL_MODES)
  mode?: TravelMode;
}

export class OptimizeMultiDayRouteDto extends OptimizeDailyRouteDto {
  @ApiProperty({ minimum: 1, maximum: 14 })
  @IsInt()
  @Min(1)
  @Max(14)
  days!: number;
}
