import { loadPipelineConfig } from "../config/agents";
import { loadEnv, requireProviderCredentials } from "../config/env";
import { ArtifactStore } from "../io/artifacts";
import { runDiscoveryPreview } from "../pipeline/orchestrator";
import { sourceTools } from "../sources";
import { CandidateRecord } from "../sources/types";
import { truncate } from "../utils/text";
import { createExecutor, createLogger, watchInterrupts } from "./context";

export interface DryRunOptions {
  topic?: string;
  configDir: string;
}

export function formatTrendList(trends: CandidateRecord[]): string {
  return trends
    .map((trend, index) => {
      const why = trend.extra?.why_trending;
      return `${index + 1}. ${trend.title}${typeof why === "string" && why ? ` — ${why}` : ""}`;
    })
    .join("\n");
}

export async function runDryRunCommand(options: DryRunOptions): Promise<void> {
  const env = loadEnv();
  const credentials = requireProviderCredentials(env);
  const config = await loadPipelineConfig(options.configDir);
  const logger = createLogger(env);
  const interrupts = watchInterrupts(logger);

  try {
    const preview = await runDiscoveryPreview(
      {
        config,
        executor: createExecutor(credentials, logger),
        artifacts: new ArtifactStore(env.TREND_STORAGE_DIR),
        discoveryTools: sourceTools({ env: process.env, logger }),
        logger,
        print: (text) => console.log(text),
        signal: interrupts.signal
      },
      { topic: options.topic }
    );

    if (preview.trends && preview.trends.length > 0) {
      console.log("\n=== TREND LIST ===");
      console.log(formatTrendList(preview.trends));
    } else {
      console.log("Scout finished but produced no parseable trend list.");
      console.log(truncate(preview.output, 500));
    }
    console.log(`\nRaw output saved to ${preview.artifactPath}`);
  } finally {
    interrupts.dispose();
  }
}
