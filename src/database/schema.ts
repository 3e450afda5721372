import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';
import { ImpersonationStatus } from '../auth/shared/interfaces/session-records.interface';

export const users = pgTable('users', {
  id: varchar('id', { length: 36 }).primaryKey(),
  username: varchar('username', { length: 64 }).notNull().unique(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  fullName: varchar('full_name', { length: 255 }),
  isActive: boolean('is_active').notNull().default(true),
  isAdmin: boolean('is_admin').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

// Session rows are audit records; a user with sessions cannot be deleted.
export const userSessions = pgTable(
  'user_sessions',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    userId: varchar('user_id', { length: 36 })
      .notNull()
      .references(() => users.id, { onDelete: 'restrict' }),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    revoked: boolean('revoked').notNull().default(false),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    refreshTokenHash: varchar('refresh_token_hash', { length: 64 }).notNull(),
    lastActivityAt: timestamp('last_activity_at', {
      withTimezone: true,
    }).notNull(),
    ipAddress: varchar('ip_address', { length: 64 }),
    userAgent: text('user_agent'),
  },
  (table) => ({
    userIdx: index('idx_user_sessions_user').on(table.userId),
  }),
);

export const impersonationSessions = pgTable(
  'impersonation_sessions',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    adminUserId: varchar('admin_user_id', { length: 36 })
      .notNull()
      .references(() => users.id, { onDelete: 'restrict' }),
    targetUserId: varchar('target_user_id', { length: 36 })
      .notNull()
      .references(() => users.id, { onDelete: 'restrict' }),
    reason: text('reason').notNull(),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    endedAt: timestamp('ended_at', { withTimezone: true }),
    status: varchar('status', { length: 16 })
      .$type<ImpersonationStatus>()
      .notNull()
      .default('active'),
    ipAddress: varchar('ip_address', { length: 64 }),
    userAgent: text('user_agent'),
  },
  (table) => ({
    adminIdx: index('idx_impersonation_admin').on(table.adminUserId),
    statusExpiryIdx: index('idx_impersonation_status_expiry').on(
      table.status,
      table.expiresAt,
    ),
  }),
);

export type UserRow = typeof users.$inferSelect;
