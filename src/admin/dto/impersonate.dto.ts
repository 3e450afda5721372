// src/admin/dto/impersonate.dto.ts
import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class StartImpersonationDto {
  @ApiProperty({
    example: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
    description: 'ID of the user to impersonate',
  })
  @IsString()
  @IsNotEmpty()
  target_user_id!: string;

  // Only shape is checked here; blank reasons fail in the service, after the
  // admin, self and target checks.
  @ApiProperty({
    example: 'Support ticket #1042 - user cannot see March invoices',
    description: 'Why the impersonation is needed (kept for audit)',
  })
  @IsString()
  @IsOptional()
  reason?: string;
}

export class EndImpersonationDto {
  @ApiProperty({
    example: '7d6c5b4a-3928-1706-f5e4-d3c2b1a09876',
    description: 'ID of the impersonation session to end',
  })
  @IsString()
  @IsNotEmpty()
  impersonation_session_id!: string;
}
