import { z } from "zod";
import { errorMessage } from "../errors";
import { CandidateRecord, SourceAdapter, SourceContext, fetchOk, requireEnv } from "./types";

const DEFAULT_SUBREDDITS = "startups,SideProject,programming,MachineLearning";

const RedditParams = z.object({
  subreddits: z.string().default(DEFAULT_SUBREDDITS),
  limit: z.number().int().min(1).max(100).default(10)
});

interface RedditListing {
  data?: {
    children?: {
      data?: { title?: string; url?: string; score?: number; num_comments?: number };
    }[];
  };
}

async function fetchAccessToken(
  clientId: string,
  clientSecret: string,
  userAgent: string,
  ctx: SourceContext
): Promise<string> {
  const response = await fetchOk(
    "https://www.reddit.com/api/v1/access_token",
    {
      method: "POST",
      headers: {
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": userAgent
      },
      body: "grant_type=client_credentials"
    },
    ctx,
    "Reddit auth"
  );
  const data = (await response.json()) as { access_token?: string };
  if (!data.access_token) {
    throw new Error("Reddit auth response missing access_token");
  }
  return data.access_token;
}

export const redditAdapter: SourceAdapter<typeof RedditParams> = {
  source: "reddit",
  toolName: "reddit_hot_posts",
  description: "Fetches hot posts from tech and startup subreddits.",
  inputSchema: {
    type: "object",
    properties: {
      subreddits: { type: "string", description: "Comma-separated list of subreddits" },
      limit: { type: "integer", description: "Posts per subreddit", default: 10 }
    }
  },
  params: RedditParams,

  async fetch(params, ctx): Promise<CandidateRecord[]> {
    const [clientId, clientSecret] = requireEnv(ctx.env, "REDDIT_CLIENT_ID", "REDDIT_CLIENT_SECRET");
    const userAgent = ctx.env.REDDIT_USER_AGENT?.trim() || "trend-to-product/0.3";
    const token = await fetchAccessToken(clientId, clientSecret, userAgent, ctx);

    const results: CandidateRecord[] = [];
    const subreddits = params.subreddits
      .split(",")
      .map((sub) => sub.trim())
      .filter(Boolean);

    for (const sub of subreddits) {
      try {
        const response = await fetchOk(
          `https://oauth.reddit.com/r/${encodeURIComponent(sub)}/hot?limit=${params.limit}`,
          { headers: { Authorization: `Bearer ${token}`, "User-Agent": userAgent } },
          ctx,
          `Reddit r/${sub}`
        );
        const listing = (await response.json()) as RedditListing;
        for (const child of listing.data?.children ?? []) {
          const post = child.data;
          if (!post?.title) continue;
          results.push({
            source: `reddit/r/${sub}`,
            title: post.title,
            url: post.url,
            score: post.score ?? 0,
            extra: { comments: post.num_comments ?? 0 }
          });
        }
      } catch (error) {
        ctx.logger.warn(`Reddit r/${sub} failed`, errorMessage(error));
      }
    }
    return results;
  }
};
