import { z } from "zod";
import { CandidateRecord, SourceAdapter, fetchOk, requireEnv } from "./types";

const TwitterParams = z.object({
  query: z.string().min(1).default("#buildinpublic OR #indiehacker"),
  limit: z.number().int().min(1).max(100).default(20)
});

interface RecentSearchResponse {
  data?: {
    id: string;
    text: string;
    public_metrics?: { like_count?: number; retweet_count?: number; reply_count?: number };
  }[];
}

export const twitterAdapter: SourceAdapter<typeof TwitterParams> = {
  source: "twitter",
  toolName: "twitter_recent_search",
  description: "Searches recent posts on X/Twitter for trending tech and startup content.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query" },
      limit: { type: "integer", description: "Maximum number of posts", default: 20 }
    }
  },
  params: TwitterParams,

  async fetch(params, ctx): Promise<CandidateRecord[]> {
    const [token] = requireEnv(ctx.env, "TWITTER_BEARER_TOKEN");
    // the API only accepts page sizes between 10 and 100
    const query = new URLSearchParams({
      query: params.query,
      max_results: String(Math.min(Math.max(params.limit, 10), 100)),
      "tweet.fields": "public_metrics"
    });
    const response = await fetchOk(
      `https://api.twitter.com/2/tweets/search/recent?${query.toString()}`,
      { headers: { Authorization: `Bearer ${token}` } },
      ctx,
      "Twitter"
    );
    const data = (await response.json()) as RecentSearchResponse;

    return (data.data ?? []).slice(0, params.limit).map((tweet) => ({
      source: "twitter",
      title: tweet.text.slice(0, 280),
      url: `https://twitter.com/i/web/status/${tweet.id}`,
      score: tweet.public_metrics?.like_count ?? 0,
      extra: { retweets: tweet.public_metrics?.retweet_count ?? 0 }
    }));
  }
};
