import { z } from "zod";
import { CandidateRecord, SourceAdapter, fetchOk } from "./types";

const HnParams = z.object({
  limit: z.number().int().min(1).max(100).default(10)
});

interface AlgoliaSearchResponse {
  hits?: {
    title?: string | null;
    url?: string | null;
    points?: number | null;
    num_comments?: number | null;
  }[];
}

export const hackerNewsAdapter: SourceAdapter<typeof HnParams> = {
  source: "hackernews",
  toolName: "hackernews_front_page",
  description: "Fetches the current Hacker News front page via the Algolia API. No API key required.",
  inputSchema: {
    type: "object",
    properties: { limit: { type: "integer", description: "Number of stories to fetch", default: 10 } }
  },
  params: HnParams,

  async fetch(params, ctx): Promise<CandidateRecord[]> {
    const query = new URLSearchParams({ tags: "front_page", hitsPerPage: String(params.limit) });
    const response = await fetchOk(`https://hn.algolia.com/api/v1/search?${query.toString()}`, {}, ctx, "Hacker News");
    const data = (await response.json()) as AlgoliaSearchResponse;

    const records: CandidateRecord[] = [];
    for (const hit of data.hits ?? []) {
      const title = hit.title?.trim();
      if (!title) continue;
      records.push({
        source: "hackernews",
        title,
        url: hit.url ?? undefined,
        score: hit.points ?? 0,
        extra: { comments: hit.num_comments ?? 0 }
      });
    }
    return records;
  }
};
