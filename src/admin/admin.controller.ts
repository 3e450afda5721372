// src/admin/admin.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { Request } from 'express';
import { ImpersonationService } from '../auth/services/impersonation.service';
import { AuthenticatedPrincipal } from '../auth/shared/interfaces/identity.interface';
import {
  ImpersonationStartResponse,
  ImpersonationView,
  MessageResponse,
  toImpersonationStartResponse,
  toImpersonationView,
} from '../auth/shared/presenters';
import { requestContextOf } from '../auth/shared/request-context.util';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { AdminGuard } from '../common/guards/admin.guard';
import {
  EndImpersonationDto,
  StartImpersonationDto,
} from './dto/impersonate.dto';

@ApiTags('Impersonation')
@ApiBearerAuth('JWT-auth')
@UseGuards(AdminGuard)
@Controller('auth/impersonations')
export class AdminController {
  constructor(private readonly impersonationService: ImpersonationService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Start impersonating a user',
    description:
      'Issues tokens that act as the target user for a limited time while recording the administrator and reason.',
  })
  @ApiBody({ type: StartImpersonationDto })
  @ApiResponse({
    status: 200,
    description: 'Impersonation started',
    schema: {
      example: {
        access_token: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...',
        refresh_token: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...',
        token_type: 'bearer',
        expires_in: 900,
        target_user_id: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
        admin_user_id: '0f1e2d3c-4b5a-6978-8796-a5b4c3d2e1f0',
        impersonation_session_id: '7d6c5b4a-3928-1706-f5e4-d3c2b1a09876',
      },
    },
  })
  @ApiResponse({
    status: 403,
    description: 'Caller is not an administrator, or targets themselves',
  })
  @ApiResponse({ status: 404, description: 'Target user not found or inactive' })
  @ApiResponse({ status: 400, description: 'Reason missing' })
  async start(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
    @Body() dto: StartImpersonationDto,
    @Req() request: Request,
  ): Promise<ImpersonationStartResponse> {
    const grant = await this.impersonationService.start(
      principal.user,
      dto.target_user_id,
      dto.reason,
      requestContextOf(request),
    );
    return toImpersonationStartResponse(grant);
  }

  @Delete()
  @ApiOperation({ summary: 'End an impersonation you started' })
  @ApiBody({ type: EndImpersonationDto })
  @ApiResponse({
    status: 200,
    description: 'Impersonation session ended successfully',
  })
  @ApiResponse({ status: 403, description: 'Started by another administrator' })
  @ApiResponse({ status: 404, description: 'Impersonation session not found' })
  async end(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
    @Body() dto: EndImpersonationDto,
  ): Promise<MessageResponse> {
    await this.impersonationService.end(
      principal.user.id,
      dto.impersonation_session_id,
    );
    return { message: 'Impersonation session ended successfully' };
  }

  @Get()
  @ApiOperation({ summary: 'List impersonations you started, newest first' })
  @ApiResponse({
    status: 200,
    description: 'Impersonation sessions',
    schema: {
      example: [
        {
          id: '7d6c5b4a-3928-1706-f5e4-d3c2b1a09876',
          admin_user_id: '0f1e2d3c-4b5a-6978-8796-a5b4c3d2e1f0',
          admin_username: 'support-admin',
          target_user_id: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
          target_username: 'jdoe',
          reason: 'Support ticket #1042',
          created_at: '2024-03-01T09:00:00.000Z',
          expires_at: '2024-03-01T11:00:00.000Z',
          ended_at: '2024-03-01T09:20:00.000Z',
          status: 'revoked',
        },
      ],
    },
  })
  async list(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
  ): Promise<ImpersonationView[]> {
    const summaries = await this.impersonationService.listForAdmin(
      principal.user,
    );
    return summaries.map(toImpersonationView);
  }
}
