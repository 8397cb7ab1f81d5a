import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema/index.js';

const { Pool } = pg;

export function createDatabase(connectionString: string) {
  // One pool per process, handed to the stores that need it
  const pool = new Pool({ connectionString });
  // Drizzle instance with full schema for typed queries
  const db = drizzle(pool, { schema });
  return { pool, db };
}

export type Database = ReturnType<typeof createDatabase>['db'];
