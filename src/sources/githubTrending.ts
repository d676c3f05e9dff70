import * as cheerio from "cheerio";
import { z } from "zod";
import { normalizeWhitespace } from "../utils/text";
import { parseCount } from "../utils/number";
import { CandidateRecord, SourceAdapter, USER_AGENT, fetchOk } from "./types";

const GithubParams = z.object({
  language: z.string().default(""),
  since: z.enum(["daily", "weekly", "monthly"]).default("weekly"),
  limit: z.number().int().min(1).max(25).default(20)
});

export function parseTrendingPage(html: string, limit: number): CandidateRecord[] {
  const $ = cheerio.load(html);
  const results: CandidateRecord[] = [];

  $("article.Box-row").each((_, element) => {
    if (results.length >= limit) return false;
    const repo = $(element);
    const link = repo.find("h2 a").first();
    const href = link.attr("href");
    if (!href) return undefined;

    const starsText = normalizeWhitespace(repo.find("a[href$='/stargazers']").first().text());
    const stars = parseCount(starsText);
    results.push({
      source: "github_trending",
      title: link.text().replace(/\s+/g, ""),
      url: `https://github.com${href}`,
      score: stars ?? undefined,
      extra: {
        description: normalizeWhitespace(repo.find("p").first().text()),
        stars: starsText || "0"
      }
    });
    return undefined;
  });

  return results;
}

export const githubTrendingAdapter: SourceAdapter<typeof GithubParams> = {
  source: "github_trending",
  toolName: "github_trending",
  description: "Scrapes the GitHub Trending page for popular repositories.",
  inputSchema: {
    type: "object",
    properties: {
      language: { type: "string", description: "Programming language filter (optional)" },
      since: { type: "string", enum: ["daily", "weekly", "monthly"], description: "Time window" }
    }
  },
  params: GithubParams,

  async fetch(params, ctx): Promise<CandidateRecord[]> {
    const language = params.language ? `/${encodeURIComponent(params.language.toLowerCase())}` : "";
    const url = `https://github.com/trending${language}?since=${params.since}`;
    const response = await fetchOk(url, { headers: { "User-Agent": USER_AGENT } }, ctx, "GitHub Trending");
    return parseTrendingPage(await response.text(), params.limit);
  }
};
