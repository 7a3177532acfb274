import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDate, IsIn, IsInt, IsNumber, IsObject, IsOptional, IsString, Length, MaxLength, Min } from 'class-validator';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { PLAN_STATUSES, PLAN_TYPES, PlanStatus, PlanType } from '../schemas/travel-plan.schema';

export class CreateTravelPlanDto {
  @ApiProperty({ example: '제주 봄 여행' })
  @IsString()
  @Length(1, 200)
  title!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @ApiProperty({ example: '2024-05-01' })
  @Type(() => Date)
  @IsDate()
  startDate!: Date;

  @ApiProperty({ example: '2024-05-03' })
  @Type(() => Date)
  @IsDate()
  endDate!: Date;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  budget?: number;

  @ApiPropertyOptional({ enum: PLAN_STATUSES })
  @IsOptional()
  @IsIn(PLAN_STATUSES)
  status?: PlanStatus;

  @ApiPropertyOptional({ type: Object, example: { day1: [{ place: '성산일출봉' }] } })
  @IsOptional()
  @IsObject()
  itinerary?: Record<string, unknown>;

  @ApiPropertyOptional({ minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  participants?: number;

  @ApiPropertyOptional({ example: '렌터카' })
  @IsOptional()
  @IsString()
  transportation?: string;

  @ApiPropertyOptional({ example: '제주공항' })
  @IsOptional()
  @IsString()
  startLocation?: string;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  weatherInfo?: Record<string, unknown>;

  @ApiPropertyOptional({ enum: PLAN_TYPES, default: 'manual' })
  @IsOptional()
  @IsIn(PLAN_TYPES)
  planType?: PlanType;
}

export class UpdateTravelPlanDto extends PartialType(CreateTravelPlanDto) {
  @ApiPropertyOptional({ default: '자동 저장' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  changeDescription?: string;
}

export class TravelPlanListQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: PLAN_STATUSES })
  @IsOptional()
  @IsIn(PLAN_STATUSES)
  status?: PlanStatus;
}
