import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;
  readonly db: Database;

  constructor(configService: ConfigService) {
    const isProd = configService.get<string>('environment') === 'production';

    // Connections are opened lazily on first query.
    this.pool = new Pool({
      connectionString: configService.getOrThrow<string>('database.url'),
      max: isProd ? 20 : 5,
      idleTimeoutMillis: isProd ? 30_000 : 10_000,
      connectionTimeoutMillis: 5_000,
      allowExitOnIdle: !isProd,
    });

    this.pool.on('error', (err) => {
      this.logger.error(`Unexpected pool error on idle client: ${err.message}`);
    });

    this.db = drizzle(this.pool, { schema });
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
