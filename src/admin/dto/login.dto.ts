import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class AdminLoginDto {
  @ApiProperty({ example: 'test-password', description: 'Shared admin password' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  password!: string;
}
