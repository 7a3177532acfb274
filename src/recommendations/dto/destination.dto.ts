import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Length,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { DESTINATION_STATUSES, DestinationStatus } from '../schemas/destination.schema';

const TAG_PATTERN = /^#\S+$/;

export class CreateDestinationDto {
  @ApiProperty({ example: '국립중앙박물관' })
  @IsString()
  @Length(1, 100)
  name!: string;

  @ApiProperty({ example: '서울특별시' })
  @IsString()
  @IsNotEmpty()
  province!: string;

  @ApiPropertyOptional({ example: '용산구' })
  @IsOptional()
  @IsString()
  region?: string;

  @ApiPropertyOptional({ example: '박물관' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ type: [String], example: ['#실내', '#박물관'] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(30)
  @Matches(TAG_PATTERN, { each: true, message: '태그는 #으로 시작해야 합니다.' })
  tags?: string[];

  @ApiPropertyOptional({ example: 37.5239 })
  @IsOptional()
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude?: number;

  @ApiPropertyOptional({ example: 126.9805 })
  @IsOptional()
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude?: number;

  @ApiPropertyOptional({ minimum: 0, maximum: 5 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(5)
  rating?: number;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  popularityScore?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl()
  imageUrl?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  isIndoor?: boolean;

  @ApiPropertyOptional({ enum: DESTINATION_STATUSES, default: 'active' })
  @IsOptional()
  @IsIn(DESTINATION_STATUSES)
  status?: DestinationStatus;
}

export class WeatherRecommendationQueryDto {
  @ApiProperty({ example: '서울특별시' })
  @IsString()
  @IsNotEmpty()
  province!: string;

  @ApiProperty({ example: '서울' })
  @IsString()
  @IsNotEmpty()
  city!: string;
}

export class DestinationListQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Partial, case-insensitive match on region' })
  @IsOptional()
  @IsString()
  region?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  category?: string;
}

export class PopularDestinationsQueryDto {
  @ApiPropertyOptional({ default: 10, minimum: 1, maximum: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  limit: number = 10;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  region?: string;
}

export class NearbyDestinationsDto {
  @ApiProperty({ example: 37.5665 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @ApiProperty({ example: 126.978 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;

  @ApiProperty({ example: 30, minimum: 0.1, maximum: 1000 })
  @IsNumber()
  @Min(0.1)
  @Max(1000)
  maxDistanceKm!: number;

  @ApiPropertyOptional({ type: [String], example: ['#카페'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  preferences?: string[];
}
