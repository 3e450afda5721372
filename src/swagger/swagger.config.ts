// src/swagger/swagger.config.ts
import { DocumentBuilder } from '@nestjs/swagger';

export const SWAGGER_PATH = 'api/docs';

export const SWAGGER_CONFIG = {
  title: 'Ledger Auth API',
  description:
    'Session and impersonation authorization for the ledger API: token refresh, identity resolution, session revocation and audited administrator impersonation',
  version: '1.0.0',
  tags: [
    {
      name: 'Authentication',
      description: 'Token refresh, logout and identity resolution',
    },
    {
      name: 'Session Management',
      description: 'Listing and revoking your own sessions',
    },
    {
      name: 'Impersonation',
      description: 'Administrator impersonation of other users',
    },
  ],
};

export function createSwaggerConfig(port: number) {
  return new DocumentBuilder()
    .setTitle(SWAGGER_CONFIG.title)
    .setDescription(SWAGGER_CONFIG.description)
    .setVersion(SWAGGER_CONFIG.version)
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Enter your **access token**',
      },
      'JWT-auth',
    )
    .addServer(`http://localhost:${port}`);
}
