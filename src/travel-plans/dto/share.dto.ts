import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { SHARE_PERMISSIONS, SharePermission } from '../schemas/travel-plan-share.schema';

export class CreateShareDto {
  @ApiPropertyOptional({ enum: SHARE_PERMISSIONS, default: 'view' })
  @IsOptional()
  @IsIn(SHARE_PERMISSIONS)
  permission?: SharePermission;

  @ApiPropertyOptional({ minimum: 1, maximum: 365 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(365)
  expiresInDays?: number;

  @ApiPropertyOptional({ minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxUses?: number;
}

export class UpdateShareDto {
  @ApiPropertyOptional({ description: 'Omit to toggle the current state' })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
