import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsString } from 'class-validator';

// Documents the body read by LocalStrategy; passport-local does the actual parsing.
export class LoginDto {
  @ApiProperty({ example: 'traveler@example.com' })
  @IsEmail()
  email!: string;

  @ApiProperty()
  @IsString()
  password!: string;
}
