import { z } from "zod";
import { AgentTool, defineTool } from "../agents/tool";
import { githubTrendingAdapter } from "./githubTrending";
import { hackerNewsAdapter } from "./hackerNews";
import { productHuntAdapter } from "./productHunt";
import { redditAdapter } from "./reddit";
import { twitterAdapter } from "./twitter";
import { MissingCredentialError, SourceAdapter, SourceContext, SourceRecord, errorRecord } from "./types";

export const ALL_ADAPTERS: SourceAdapter[] = [
  hackerNewsAdapter,
  githubTrendingAdapter,
  redditAdapter,
  productHuntAdapter,
  twitterAdapter
];

/**
 * Runs one adapter and never throws: any failure becomes a single error-marker record
 * tagged with the adapter's source name.
 */
export async function runAdapter(
  adapter: SourceAdapter,
  rawParams: unknown,
  ctx: SourceContext
): Promise<SourceRecord[]> {
  try {
    const params: unknown = adapter.params.parse(rawParams ?? {});
    const records = await adapter.fetch(params, ctx);
    ctx.logger.info(`${adapter.source}: ${records.length} record(s)`);
    return records;
  } catch (error) {
    if (error instanceof MissingCredentialError) {
      ctx.logger.info(`${adapter.source}: skipped, ${error.message}`);
    } else {
      ctx.logger.warn(`${adapter.source} adapter failed`, error instanceof Error ? error.message : error);
    }
    return [errorRecord(adapter.source, error)];
  }
}

/** Every adapter in turn; the combined list always comes back, failures included as markers. */
export async function discoverAll(
  ctx: SourceContext,
  adapters: SourceAdapter[] = ALL_ADAPTERS
): Promise<SourceRecord[]> {
  const results: SourceRecord[] = [];
  for (const adapter of adapters) {
    results.push(...(await runAdapter(adapter, {}, ctx)));
  }
  return results;
}

export function sourceTools(ctx: SourceContext, adapters: SourceAdapter[] = ALL_ADAPTERS): AgentTool[] {
  return adapters.map((adapter) =>
    defineTool({
      name: adapter.toolName,
      description: adapter.description,
      inputSchema: adapter.inputSchema,
      schema: z.unknown(),
      run: async (input) => JSON.stringify(await runAdapter(adapter, input, ctx))
    })
  );
}
