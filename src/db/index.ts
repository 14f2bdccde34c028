import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { neon } from '@neondatabase/serverless';
import * as schema from './schema';

export type Database = NeonHttpDatabase<typeof schema>;

/**
 * Create a database handle. The caller owns it; there is no module-level client.
 */
export function createDb(databaseUrl: string): Database {
    const sql = neon(databaseUrl);
    return drizzle(sql, { schema });
}

// Export schema for use elsewhere
export * from './schema';
