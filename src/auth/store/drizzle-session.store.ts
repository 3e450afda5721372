import { Injectable } from '@nestjs/common';
import { and, desc, eq, lte } from 'drizzle-orm';
import { NotFoundError } from '../../common/errors/auth.errors';
import { Database, DatabaseService } from '../../database/database.service';
import { impersonationSessions, userSessions } from '../../database/schema';
import {
  ImpersonationSession,
  RegularSession,
} from '../shared/interfaces/session-records.interface';
import {
  ImpersonationRecordStore,
  RecordMutator,
  RecordStore,
  SessionStore,
} from './session-store';

class RegularSessionTable implements RecordStore<RegularSession> {
  constructor(private readonly db: Database) {}

  async put(record: RegularSession): Promise<void> {
    await this.db.insert(userSessions).values(record);
  }

  async get(id: string): Promise<RegularSession | null> {
    const [row] = await this.db
      .select()
      .from(userSessions)
      .where(eq(userSessions.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByOwner(userId: string): Promise<RegularSession[]> {
    return this.db
      .select()
      .from(userSessions)
      .where(eq(userSessions.userId, userId))
      .orderBy(desc(userSessions.issuedAt));
  }

  async update(
    id: string,
    mutator: RecordMutator<RegularSession>,
  ): Promise<RegularSession> {
    return this.db.transaction(async (tx) => {
      const [current] = await tx
        .select()
        .from(userSessions)
        .where(eq(userSessions.id, id))
        .for('update');
      if (!current) {
        throw new NotFoundError('Session not found');
      }

      const next = mutator(current);
      if (next === current) {
        return current;
      }

      const { id: _id, ...changes } = next;
      const [saved] = await tx
        .update(userSessions)
        .set(changes)
        .where(eq(userSessions.id, id))
        .returning();
      return saved ?? next;
    });
  }
}

class ImpersonationSessionTable implements ImpersonationRecordStore {
  constructor(private readonly db: Database) {}

  async put(record: ImpersonationSession): Promise<void> {
    await this.db.insert(impersonationSessions).values(record);
  }

  async get(id: string): Promise<ImpersonationSession | null> {
    const [row] = await this.db
      .select()
      .from(impersonationSessions)
      .where(eq(impersonationSessions.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByOwner(adminUserId: string): Promise<ImpersonationSession[]> {
    return this.db
      .select()
      .from(impersonationSessions)
      .where(eq(impersonationSessions.adminUserId, adminUserId))
      .orderBy(desc(impersonationSessions.issuedAt));
  }

  async findLapsed(now: Date): Promise<ImpersonationSession[]> {
    return this.db
      .select()
      .from(impersonationSessions)
      .where(
        and(
          eq(impersonationSessions.status, 'active'),
          lte(impersonationSessions.expiresAt, now),
        ),
      );
  }

  async update(
    id: string,
    mutator: RecordMutator<ImpersonationSession>,
  ): Promise<ImpersonationSession> {
    return this.db.transaction(async (tx) => {
      const [current] = await tx
        .select()
        .from(impersonationSessions)
        .where(eq(impersonationSessions.id, id))
        .for('update');
      if (!current) {
        throw new NotFoundError('Impersonation session not found');
      }

      const next = mutator(current);
      if (next === current) {
        return current;
      }

      const { id: _id, ...changes } = next;
      const [saved] = await tx
        .update(impersonationSessions)
        .set(changes)
        .where(eq(impersonationSessions.id, id))
        .returning();
      return saved ?? next;
    });
  }
}

/** Postgres-backed store; `update` holds a row lock for the mutator's run. */
@Injectable()
export class DrizzleSessionStore extends SessionStore {
  readonly regular: RecordStore<RegularSession>;
  readonly impersonation: ImpersonationRecordStore;

  constructor(database: DatabaseService) {
    super();
    this.regular = new RegularSessionTable(database.db);
    this.impersonation = new ImpersonationSessionTable(database.db);
  }
}
