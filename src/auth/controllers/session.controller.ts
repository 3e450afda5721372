import { Controller, Delete, Get, Param } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CurrentPrincipal } from '../../common/decorators/current-principal.decorator';
import { NotAuthorizedError } from '../../common/errors/auth.errors';
import { SessionService } from '../services/session.service';
import { AuthenticatedPrincipal } from '../shared/interfaces/identity.interface';
import {
  MessageResponse,
  SessionView,
  toSessionView,
} from '../shared/presenters';

@ApiTags('Session Management')
@ApiBearerAuth('JWT-auth')
@Controller('auth/sessions')
export class SessionController {
  constructor(private readonly sessionService: SessionService) {}

  @Get()
  @ApiOperation({ summary: 'List the current user\'s active sessions' })
  @ApiResponse({
    status: 200,
    description: 'Active sessions, newest first',
    schema: {
      example: [
        {
          id: '7d6c5b4a-3928-1706-f5e4-d3c2b1a09876',
          user_id: 'c3a9b8e1-2c4d-4f5b-a6d8-1e2f3c4d5e6f',
          status: 'active',
          created_at: '2024-03-01T09:00:00.000Z',
          expires_at: '2024-03-08T09:00:00.000Z',
          last_activity: '2024-03-01T09:30:00.000Z',
          ip_address: '203.0.113.7',
          user_agent: 'Mozilla/5.0...',
        },
      ],
    },
  })
  @ApiResponse({ status: 403, description: 'Not available while impersonating' })
  async listSessions(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
  ): Promise<SessionView[]> {
    const userId = this.ownUserId(principal);
    const sessions = await this.sessionService.listActive(userId);
    return sessions.map((session) => toSessionView(session, 'active'));
  }

  @Delete(':sessionId')
  @ApiOperation({ summary: 'Revoke one of the current user\'s sessions' })
  @ApiParam({ name: 'sessionId', description: 'Session to revoke' })
  @ApiResponse({ status: 200, description: 'Session revoked successfully' })
  @ApiResponse({ status: 404, description: 'Session not found' })
  async revokeSession(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
    @Param('sessionId') sessionId: string,
  ): Promise<MessageResponse> {
    await this.sessionService.revokeOwned(this.ownUserId(principal), sessionId);
    return { message: 'Session revoked successfully' };
  }

  @Delete()
  @ApiOperation({ summary: 'Revoke all of the current user\'s sessions' })
  @ApiResponse({ status: 200, description: 'Sessions revoked' })
  async revokeAllSessions(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
  ): Promise<MessageResponse> {
    const count = await this.sessionService.revokeAll(
      this.ownUserId(principal),
    );
    return { message: `Revoked ${count} sessions` };
  }

  private ownUserId(principal: AuthenticatedPrincipal): string {
    if (principal.identity.impersonating) {
      throw new NotAuthorizedError(
        'Session management is not available while impersonating',
      );
    }
    return principal.identity.userId;
  }
}
