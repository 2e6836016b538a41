import { ApiProperty } from '@nestjs/swagger';

export class AdminSessionRto {
  @ApiProperty({ example: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...', description: 'Admin session token' })
  accessToken!: string;

  @ApiProperty({ example: '12h' })
  expiresIn!: string;
}
