import { extractJson, isRecord } from "../extract/jsonExtract";
import { CandidateRecord } from "../sources/types";

/**
 * Reads the scout's trend list back into Candidate Records. Entries without a title
 * are dropped; null when the output holds no JSON list at all.
 */
export function parseTrendList(text: string): CandidateRecord[] | null {
  const value = extractJson(text);
  const list = Array.isArray(value) ? value : isRecord(value) && Array.isArray(value.trends) ? value.trends : null;
  if (!list) return null;

  const records: CandidateRecord[] = [];
  for (const item of list) {
    if (!isRecord(item) || typeof item.title !== "string" || !item.title.trim()) continue;
    const { source, title, url, score, ...extra } = item;
    records.push({
      source: typeof source === "string" && source ? source : "unknown",
      title: title.trim(),
      url: typeof url === "string" && url ? url : undefined,
      score: typeof score === "number" && Number.isFinite(score) ? score : undefined,
      extra: Object.keys(extra).length > 0 ? extra : undefined
    });
  }
  return records;
}
