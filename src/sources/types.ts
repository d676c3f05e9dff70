import { z } from "zod";
import { ToolInputSchema } from "../llm/provider";
import { Logger } from "../logging/logger";

export interface CandidateRecord {
  source: string;
  title: string;
  url?: string;
  score?: number;
  /** Adapter-specific fields: comment counts, votes, topics, stars. */
  extra?: Record<string, unknown>;
}

/** Stands in for an adapter's whole output when that adapter could not run. */
export interface SourceErrorRecord {
  source: string;
  error: string;
}

export type SourceRecord = CandidateRecord | SourceErrorRecord;

export type SourceEnv = Record<string, string | undefined>;

export interface SourceContext {
  env: SourceEnv;
  logger: Logger;
  timeoutMs?: number;
}

export interface SourceAdapter<S extends z.ZodTypeAny = z.ZodTypeAny> {
  source: string;
  toolName: string;
  description: string;
  inputSchema: ToolInputSchema;
  params: S;
  fetch(params: z.infer<S>, ctx: SourceContext): Promise<CandidateRecord[]>;
}

export class MissingCredentialError extends Error {
  constructor(names: string) {
    super(`${names} not set`);
    this.name = "MissingCredentialError";
  }
}

export const DEFAULT_TIMEOUT_MS = 15_000;
export const USER_AGENT = "Mozilla/5.0 (compatible; trend-to-product/0.3)";

export function isErrorRecord(record: SourceRecord): record is SourceErrorRecord {
  return "error" in record;
}

export function errorRecord(source: string, error: unknown): SourceErrorRecord {
  return { source, error: error instanceof Error ? error.message : String(error) };
}

export function requireEnv(env: SourceEnv, ...names: string[]): string[] {
  const values = names.map((name) => env[name]?.trim() ?? "");
  if (values.some((value) => !value)) {
    throw new MissingCredentialError(names.join("/"));
  }
  return values;
}

export async function fetchOk(url: string, init: RequestInit, ctx: SourceContext, label: string): Promise<Response> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(ctx.timeoutMs ?? DEFAULT_TIMEOUT_MS)
  });
  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new Error(`${label} request failed (${response.status})${text ? `: ${text.slice(0, 200)}` : ""}`);
  }
  return response;
}
