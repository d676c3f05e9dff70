import { CandidateRecord } from "../sources/types";

export type RunStatus = "running" | "success" | "error";

export interface RunRecord {
  id: number;
  startedAt: string;
  finishedAt: string | null;
  topic: string | null;
  status: RunStatus;
  error: string | null;
}

/**
 * Append-only log of pipeline invocations. A run is created once and updated once,
 * when it ends; identifiers come from an increasing counter with no guard against
 * two processes starting runs at the same moment.
 */
export interface RunLedger {
  startRun(topic: string | null): Promise<number>;
  finishRun(runId: number, status: Exclude<RunStatus, "running">, error?: string | null): Promise<void>;
  /** Optional analytics sink for the trends a run discovered. */
  recordCandidates(runId: number, records: CandidateRecord[]): Promise<void>;
  listRuns(limit?: number): Promise<RunRecord[]>;
  close(): Promise<void>;
}
