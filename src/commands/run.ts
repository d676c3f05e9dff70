import { loadPipelineConfig } from "../config/agents";
import { loadEnv, requireProviderCredentials } from "../config/env";
import { ArtifactStore } from "../io/artifacts";
import { createRunLedger } from "../ledger";
import { runPipeline } from "../pipeline/orchestrator";
import { sourceTools } from "../sources";
import { InquirerPrompter } from "../ui/prompter";
import { ProjectWriter } from "../writer/projectWriter";
import { createExecutor, createLogger, watchInterrupts } from "./context";

export interface RunCommandOptions {
  topic?: string;
  configDir: string;
}

export async function runPipelineCommand(options: RunCommandOptions): Promise<void> {
  const env = loadEnv();
  const credentials = requireProviderCredentials(env);
  const config = await loadPipelineConfig(options.configDir);
  const logger = createLogger(env);
  const ledger = createRunLedger({ databaseUrl: env.DATABASE_URL, storageDir: env.TREND_STORAGE_DIR });
  const interrupts = watchInterrupts(logger);

  try {
    const result = await runPipeline(
      {
        config,
        executor: createExecutor(credentials, logger),
        artifacts: new ArtifactStore(env.TREND_STORAGE_DIR),
        discoveryTools: sourceTools({ env: process.env, logger }),
        logger,
        print: (text) => console.log(text),
        signal: interrupts.signal,
        ledger,
        writer: new ProjectWriter({ outputDir: env.TREND_OUTPUT_DIR, logger }),
        prompter: new InquirerPrompter()
      },
      { topic: options.topic }
    );

    console.log(`\n=== CHOSEN IDEA: ${result.chosenIdea.title} ===`);
    console.log(
      result.build && result.build.written.length > 0
        ? `Pipeline complete. Project written to ${result.build.projectDir}`
        : `Pipeline complete, but no files were generated. Retry with "recover" once ${env.TREND_STORAGE_DIR} holds a usable construction output.`
    );
  } finally {
    interrupts.dispose();
    await ledger.close();
  }
}
