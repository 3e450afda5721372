import { Injectable } from '@nestjs/common';
import { eq, inArray } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { users } from '../database/schema';
import { UserAccount } from './interfaces/user-account.interface';

const accountColumns = {
  id: users.id,
  username: users.username,
  email: users.email,
  fullName: users.fullName,
  isActive: users.isActive,
  isAdmin: users.isAdmin,
};

/**
 * Read-only lookups of the user accounts sessions refer to. Account
 * management lives elsewhere.
 */
@Injectable()
export class UsersService {
  constructor(private readonly database: DatabaseService) {}

  async findById(id: string): Promise<UserAccount | null> {
    const [user] = await this.database.db
      .select(accountColumns)
      .from(users)
      .where(eq(users.id, id))
      .limit(1);

    return user ?? null;
  }

  /** Unknown ids are left out of the result. */
  async findByIds(ids: string[]): Promise<UserAccount[]> {
    if (ids.length === 0) {
      return [];
    }

    return this.database.db
      .select(accountColumns)
      .from(users)
      .where(inArray(users.id, [...new Set(ids)]));
  }
}
