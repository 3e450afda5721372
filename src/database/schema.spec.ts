import { getTableConfig } from 'drizzle-orm/pg-core';
import { impersonationSessions, userSessions } from './schema';

// Deleting a user must never take session audit rows with it.
describe('schema', () => {
  it('should restrict deleting a user with regular sessions', () => {
    const { foreignKeys } = getTableConfig(userSessions);

    expect(foreignKeys.map((key) => key.onDelete)).toEqual(['restrict']);
  });

  it('should restrict deleting a user named by impersonation sessions', () => {
    const { foreignKeys } = getTableConfig(impersonationSessions);

    expect(foreignKeys.map((key) => key.onDelete)).toEqual([
      'restrict',
      'restrict',
    ]);
  });
});
