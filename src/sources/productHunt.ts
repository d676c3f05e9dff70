import { z } from "zod";
import { CandidateRecord, SourceAdapter, fetchOk, requireEnv } from "./types";

const PH_GRAPHQL_URL = "https://api.producthunt.com/v2/api/graphql";

const QUERY = `
query TrendingPosts($first: Int!) {
  posts(first: $first, order: VOTES) {
    edges {
      node {
        name
        tagline
        url
        votesCount
        commentsCount
        topics {
          edges { node { name } }
        }
      }
    }
  }
}
`;

const PhParams = z.object({
  limit: z.number().int().min(1).max(50).default(10)
});

interface PhResponse {
  data?: {
    posts?: {
      edges?: {
        node: {
          name: string;
          tagline?: string;
          url?: string;
          votesCount?: number;
          commentsCount?: number;
          topics?: { edges?: { node: { name: string } }[] };
        };
      }[];
    };
  };
  errors?: { message: string }[];
}

export const productHuntAdapter: SourceAdapter<typeof PhParams> = {
  source: "producthunt",
  toolName: "producthunt_top_posts",
  description: "Fetches today's most voted products from the ProductHunt GraphQL v2 API.",
  inputSchema: {
    type: "object",
    properties: { limit: { type: "integer", description: "Number of posts to fetch", default: 10 } }
  },
  params: PhParams,

  async fetch(params, ctx): Promise<CandidateRecord[]> {
    const [apiKey] = requireEnv(ctx.env, "PRODUCTHUNT_API_KEY");
    const response = await fetchOk(
      PH_GRAPHQL_URL,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({ query: QUERY, variables: { first: params.limit } })
      },
      ctx,
      "ProductHunt"
    );

    const data = (await response.json()) as PhResponse;
    if (data.errors?.length) {
      throw new Error(`ProductHunt GraphQL error: ${data.errors.map((error) => error.message).join("; ")}`);
    }

    return (data.data?.posts?.edges ?? []).map(({ node }) => ({
      source: "producthunt",
      title: node.name,
      url: node.url,
      score: node.votesCount ?? 0,
      extra: {
        tagline: node.tagline ?? "",
        comments: node.commentsCount ?? 0,
        topics: (node.topics?.edges ?? []).map((topic) => topic.node.name)
      }
    }));
  }
};
