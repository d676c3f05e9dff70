import { desc, eq, sql } from "drizzle-orm";
import { NodePgDatabase } from "drizzle-orm/node-postgres";
import { closePool, getDb } from "../db/client";
import * as schema from "../db/schema";
import { CandidateRecord } from "../sources/types";
import { RunLedger, RunRecord, RunStatus } from "./types";

function toStatus(value: string): RunStatus {
  return value === "success" || value === "error" ? value : "running";
}

/** Run Ledger on Postgres through drizzle; tables are created on first use. */
export class DrizzleRunLedger implements RunLedger {
  private ready: Promise<void> | null = null;

  constructor(
    private readonly db: NodePgDatabase,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  static fromUrl(databaseUrl: string): DrizzleRunLedger {
    return new DrizzleRunLedger(getDb(databaseUrl), closePool);
  }

  async startRun(topic: string | null): Promise<number> {
    await this.ensureSchema();
    const [row] = await this.db.insert(schema.runs).values({ topic }).returning({ id: schema.runs.id });
    return row.id;
  }

  async finishRun(runId: number, status: Exclude<RunStatus, "running">, error: string | null = null): Promise<void> {
    await this.ensureSchema();
    await this.db
      .update(schema.runs)
      .set({ finishedAt: new Date(), status, error })
      .where(eq(schema.runs.id, runId));
  }

  async recordCandidates(runId: number, records: CandidateRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.ensureSchema();
    const values: (typeof schema.trends.$inferInsert)[] = records.map((record) => ({
      runId,
      source: record.source,
      title: record.title,
      url: record.url ?? null,
      score: typeof record.score === "number" ? Math.round(record.score) : null,
      extra: record.extra ?? null
    }));
    await this.db.insert(schema.trends).values(values);
  }

  async listRuns(limit = 20): Promise<RunRecord[]> {
    await this.ensureSchema();
    const rows = await this.db.select().from(schema.runs).orderBy(desc(schema.runs.id)).limit(limit);
    return rows.map((row) => ({
      id: row.id,
      startedAt: row.startedAt.toISOString(),
      finishedAt: row.finishedAt ? row.finishedAt.toISOString() : null,
      topic: row.topic,
      status: toStatus(row.status),
      error: row.error
    }));
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private ensureSchema(): Promise<void> {
    if (!this.ready) {
      this.ready = this.createTables();
    }
    return this.ready;
  }

  private async createTables(): Promise<void> {
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS runs (
        id serial PRIMARY KEY,
        started_at timestamptz NOT NULL DEFAULT now(),
        finished_at timestamptz,
        topic text,
        status text NOT NULL DEFAULT 'running',
        error text
      )
    `);
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS trends (
        id serial PRIMARY KEY,
        run_id integer NOT NULL REFERENCES runs(id),
        source text NOT NULL,
        title text NOT NULL,
        url text,
        score integer,
        extra jsonb
      )
    `);
    await this.db.execute(sql`CREATE INDEX IF NOT EXISTS trends_run_idx ON trends (run_id)`);
  }
}
