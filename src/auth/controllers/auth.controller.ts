import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CurrentPrincipal } from '../../common/decorators/current-principal.decorator';
import { Public } from '../../common/decorators/public.decorator';
import { RefreshTokenDto } from '../dto/refresh-token.dto';
import { ImpersonationService } from '../services/impersonation.service';
import { SessionService } from '../services/session.service';
import { AuthenticatedPrincipal } from '../shared/interfaces/identity.interface';
import {
  MessageResponse,
  RefreshResponse,
  toRefreshResponse,
  toWhoAmIResponse,
  WhoAmIResponse,
} from '../shared/presenters';

@ApiTags('Authentication')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly sessionService: SessionService,
    private readonly impersonationService: ImpersonationService,
  ) {}

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Exchange a refresh token for a new access token',
    description:
      'The refresh token is not rotated; the same token is returned and stays valid until its session ends.',
  })
  @ApiBody({ type: RefreshTokenDto })
  @ApiResponse({
    status: 200,
    description: 'New access token issued',
    schema: {
      example: {
        access_token: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...',
        refresh_token: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...',
        token_type: 'bearer',
        expires_in: 900,
        user_id: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
      },
    },
  })
  @ApiResponse({
    status: 401,
    description: 'Refresh token invalid, or its session revoked or expired',
  })
  async refresh(@Body() dto: RefreshTokenDto): Promise<RefreshResponse> {
    const refreshed = await this.sessionService.refresh(dto.refresh_token);
    return toRefreshResponse(refreshed);
  }

  @Delete('logout')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({
    summary: 'End the session behind the presented token',
    description:
      'Revokes a regular session, or ends the impersonation when called with an impersonation token.',
  })
  @ApiResponse({ status: 200, description: 'Successfully logged out' })
  async logout(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
  ): Promise<MessageResponse> {
    const { identity } = principal;
    if (identity.impersonating) {
      await this.impersonationService.end(
        identity.adminUserId,
        identity.sessionId,
      );
    } else {
      await this.sessionService.revoke(identity.sessionId);
    }
    return { message: 'Successfully logged out' };
  }

  @Get('whoami')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Resolve the acting identity of the bearer token' })
  @ApiResponse({
    status: 200,
    description: 'Acting identity',
    schema: {
      example: {
        user_id: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
        username: 'jdoe',
        email: 'jdoe@example.com',
        is_admin: false,
        is_impersonating: true,
        impersonation: {
          admin_user_id: '0f1e2d3c-4b5a-6978-8796-a5b4c3d2e1f0',
          admin_username: 'support-admin',
          session_id: '7d6c5b4a-3928-1706-f5e4-d3c2b1a09876',
          reason: 'Support ticket #1042',
        },
      },
    },
  })
  @ApiResponse({ status: 401, description: 'Could not validate credentials' })
  whoami(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
  ): WhoAmIResponse {
    return toWhoAmIResponse(principal);
  }
}
