// src/config/validation.schema.ts
import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('production'),
  PORT: Joi.number().default(5555),
  LOG_LEVEL: Joi.string()
    .valid('verbose', 'debug', 'log', 'warn', 'error', 'fatal')
    .default('log'),

  DATABASE_URL: Joi.string()
    .uri({ scheme: ['postgres', 'postgresql'] })
    .required(),

  // JWT Configuration
  JWT_SECRET: Joi.string().min(32).required().messages({
    'string.min': 'JWT_SECRET must be at least 32 characters long',
    'any.required': 'JWT_SECRET is required',
  }),
  JWT_REFRESH_SECRET: Joi.string().min(32).required().messages({
    'string.min': 'JWT_REFRESH_SECRET must be at least 32 characters long',
    'any.required': 'JWT_REFRESH_SECRET is required',
  }),
  JWT_ISSUER: Joi.string().default('ledger-auth-api'),
  JWT_AUDIENCE: Joi.string().default('ledger-client'),
  JWT_ACCESS_EXPIRES_MINUTES: Joi.number().integer().min(1).default(15),
  JWT_REFRESH_EXPIRES_DAYS: Joi.number().integer().min(1).default(7),

  // Impersonation
  IMPERSONATION_TIMEOUT_MINUTES: Joi.number()
    .integer()
    .min(1)
    .max(120)
    .default(120),
  IMPERSONATION_SWEEP_ENABLED: Joi.boolean().default(false),
  IMPERSONATION_SWEEP_CRON: Joi.string().default('*/5 * * * *'),

  // App URLs
  CORS_ORIGIN: Joi.string().default('http://localhost:5173'),

  // Rate limiting
  THROTTLE_TTL: Joi.number().default(60000),
  THROTTLE_LIMIT: Joi.number().default(100),
});
