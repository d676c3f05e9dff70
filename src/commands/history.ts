import { loadEnv } from "../config/env";
import { createRunLedger } from "../ledger";
import { RunRecord } from "../ledger/types";

export function formatRun(run: RunRecord): string {
  const topic = run.topic ? ` topic="${run.topic}"` : "";
  const finished = run.finishedAt ? ` -> ${run.finishedAt}` : "";
  const error = run.error ? ` (${run.error})` : "";
  return `#${run.id} ${run.status.padEnd(7)} ${run.startedAt}${finished}${topic}${error}`;
}

export async function runHistoryCommand(options: { limit: number }): Promise<void> {
  const env = loadEnv();
  const ledger = createRunLedger({ databaseUrl: env.DATABASE_URL, storageDir: env.TREND_STORAGE_DIR });
  try {
    const runs = await ledger.listRuns(options.limit);
    if (runs.length === 0) {
      console.log("No runs recorded yet.");
      return;
    }
    for (const run of runs) {
      console.log(formatRun(run));
    }
  } finally {
    await ledger.close();
  }
}
