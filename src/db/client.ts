import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";

let pool: Pool | null = null;
let db: NodePgDatabase | null = null;

function requireDatabaseUrl(url?: string): string {
  const resolved = url ?? process.env.DATABASE_URL;
  if (!resolved) {
    throw new Error("DATABASE_URL is not set in the environment.");
  }
  return resolved;
}

export function getPool(url?: string): Pool {
  if (!pool) {
    const connectionString = requireDatabaseUrl(url);
    pool = new Pool({
      connectionString,
      // hosted Postgres (Neon, Supabase) asks for TLS through sslmode=require
      ssl: /sslmode=require/.test(connectionString) ? { rejectUnauthorized: false } : undefined
    });
  }
  return pool;
}

export function getDb(url?: string): NodePgDatabase {
  if (!db) {
    db = drizzle(getPool(url));
  }
  return db;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
