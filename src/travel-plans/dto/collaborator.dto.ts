import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsIn, IsOptional } from 'class-validator';
import { SHARE_PERMISSIONS, SharePermission } from '../schemas/travel-plan-share.schema';

export class AddCollaboratorDto {
  @ApiProperty({ example: 'friend@example.com' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ enum: SHARE_PERMISSIONS, default: 'edit' })
  @IsOptional()
  @IsIn(SHARE_PERMISSIONS)
  permission?: SharePermission;
}
