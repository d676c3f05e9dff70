import { RunLedger, RunRecord, RunStatus } from "./types";
import { CandidateRecord } from "../sources/types";
import { candidateLogPath, runLedgerPath } from "../io/paths";
import { appendJsonLines, pathExists, readJson, writeJson } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

interface LedgerFile {
  schema_version: "1.0";
  runs: RunRecord[];
}

/** Run Ledger kept as JSON under the storage root; used when no database is configured. */
export class FileRunLedger implements RunLedger {
  private readonly ledgerPath: string;
  private readonly candidatesPath: string;

  constructor(storageDir: string) {
    this.ledgerPath = runLedgerPath(storageDir);
    this.candidatesPath = candidateLogPath(storageDir);
  }

  async startRun(topic: string | null): Promise<number> {
    const ledger = await this.load();
    const id = ledger.runs.reduce((max, run) => Math.max(max, run.id), 0) + 1;
    ledger.runs.push({
      id,
      startedAt: nowUtcIsoSeconds(),
      finishedAt: null,
      topic,
      status: "running",
      error: null
    });
    await writeJson(this.ledgerPath, ledger);
    return id;
  }

  async finishRun(runId: number, status: Exclude<RunStatus, "running">, error: string | null = null): Promise<void> {
    const ledger = await this.load();
    const run = ledger.runs.find((entry) => entry.id === runId);
    if (!run) return;
    run.finishedAt = nowUtcIsoSeconds();
    run.status = status;
    run.error = error;
    await writeJson(this.ledgerPath, ledger);
  }

  async recordCandidates(runId: number, records: CandidateRecord[]): Promise<void> {
    await appendJsonLines(
      this.candidatesPath,
      records.map((record) => ({ run_id: runId, ...record }))
    );
  }

  async listRuns(limit = 20): Promise<RunRecord[]> {
    const ledger = await this.load();
    return [...ledger.runs].sort((a, b) => b.id - a.id).slice(0, limit);
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private async load(): Promise<LedgerFile> {
    if (!(await pathExists(this.ledgerPath))) {
      return { schema_version: "1.0", runs: [] };
    }
    return readJson<LedgerFile>(this.ledgerPath);
  }
}
