import { Module, Global, Inject, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, NeonDatabase } from 'drizzle-orm/neon-serverless';
import ws from 'ws';
import * as schema from './schema/index.js';
import type { AppConfig } from '../config/env.js';

export const DATABASE_POOL = 'DATABASE_POOL';
export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type DatabaseConnection = NeonDatabase<typeof schema>;

export type Transaction = Parameters<
  Parameters<DatabaseConnection['transaction']>[0]
>[0];

/** The query surface shared by the connection and an open transaction. */
export type Executor = Pick<
  DatabaseConnection,
  'select' | 'insert' | 'update' | 'delete' | 'execute'
>;

// Node 20 has no global WebSocket; the pool's interactive transactions need one.
neonConfig.webSocketConstructor = ws;

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_POOL,
      useFactory: (config: ConfigService<AppConfig, true>): Pool =>
        new Pool({ connectionString: config.get('DATABASE_URL', { infer: true }) }),
      inject: [ConfigService],
    },
    {
      provide: DATABASE_CONNECTION,
      useFactory: (pool: Pool): DatabaseConnection =>
        drizzle({ client: pool, schema }),
      inject: [DATABASE_POOL],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
