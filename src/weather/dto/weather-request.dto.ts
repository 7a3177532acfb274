import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Length, Min } from 'class-validator';
import { MAX_FORECAST_DAYS } from '../weather-api.client';

export class WeatherRequestDto {
  @ApiProperty({ example: 'Seoul' })
  @IsString()
  @IsNotEmpty()
  city!: string;

  @ApiPropertyOptional({ example: 'KR' })
  @IsOptional()
  @IsString()
  @Length(2, 2)
  country?: string;
}

export class CountryQueryDto {
  @ApiPropertyOptional({ example: 'KR' })
  @IsOptional()
  @IsString()
  @Length(2, 2)
  country?: string;
}

export class ForecastQueryDto extends CountryQueryDto {
  // larger values are capped by the client
  @ApiPropertyOptional({ minimum: 1, maximum: MAX_FORECAST_DAYS, default: 7 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  days?: number;
}
