// src/config/app.config.ts

/**
 * Configuration factory function that validates environment variables
 * and returns the application configuration.
 *
 * @throws Error if required environment variables are missing or invalid
 */
export const appConfig = () => {
  // Validate required environment variables
  const requiredEnvVars = ['DATABASE_URL', 'JWT_SECRET', 'JWT_REFRESH_SECRET'];
  const missingVars = requiredEnvVars.filter(
    (varName) => !process.env[varName],
  );

  if (missingVars.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n` +
        'Please check your .env file and ensure these variables are set.',
    );
  }

  // Validate JWT secret lengths
  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters long');
  }

  if (
    process.env.JWT_REFRESH_SECRET &&
    process.env.JWT_REFRESH_SECRET.length < 32
  ) {
    throw new Error('JWT_REFRESH_SECRET must be at least 32 characters long');
  }

  if (process.env.JWT_SECRET === process.env.JWT_REFRESH_SECRET) {
    throw new Error('JWT_SECRET and JWT_REFRESH_SECRET must differ');
  }

  const impersonationTimeout = parseInt(
    process.env.IMPERSONATION_TIMEOUT_MINUTES ?? '120',
    10,
  );
  if (!(impersonationTimeout >= 1 && impersonationTimeout <= 120)) {
    throw new Error('IMPERSONATION_TIMEOUT_MINUTES must be between 1 and 120');
  }

  return {
    // Server configuration
    port: parseInt(process.env.PORT ?? '5555', 10),
    environment: process.env.NODE_ENV ?? 'production',
    logLevel: process.env.LOG_LEVEL ?? 'log',

    // Database configuration
    database: {
      url: process.env.DATABASE_URL,
    },

    // Token signing; both lifetimes are counted from the injected clock
    jwt: {
      secret: process.env.JWT_SECRET,
      refreshSecret: process.env.JWT_REFRESH_SECRET,
      issuer: process.env.JWT_ISSUER ?? 'ledger-auth-api',
      audience: process.env.JWT_AUDIENCE ?? 'ledger-client',
      accessExpiresMinutes: parseInt(
        process.env.JWT_ACCESS_EXPIRES_MINUTES ?? '15',
        10,
      ),
      refreshExpiresDays: parseInt(
        process.env.JWT_REFRESH_EXPIRES_DAYS ?? '7',
        10,
      ),
    },

    // Impersonation configuration
    impersonation: {
      timeoutMinutes: impersonationTimeout,
      sweep: {
        enabled: process.env.IMPERSONATION_SWEEP_ENABLED === 'true',
        cronSchedule: process.env.IMPERSONATION_SWEEP_CRON ?? '*/5 * * * *',
      },
    },

    // CORS configuration
    cors: {
      origin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
      credentials: true,
    },

    // Rate limiting configuration
    throttle: {
      ttl: parseInt(process.env.THROTTLE_TTL ?? '60000', 10),
      limit: parseInt(process.env.THROTTLE_LIMIT ?? '100', 10),
    },
  };
};
