#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runPipelineCommand } from "../commands/run";
import { runDryRunCommand } from "../commands/dryRun";
import { runRecoverCommand } from "../commands/recover";
import { runHistoryCommand } from "../commands/history";
import { ConfigurationError, UserAbortError, errorMessage, isInterruption } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.TREND_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const envPath = resolveEnvPath(process.argv.slice(2), path.resolve(process.cwd(), ".env"));
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("trend-to-product")
  .description(
    "Scout trends, rank product ideas, design the one you pick and scaffold it. " +
      "Run one pipeline at a time: every run overwrites the same files under the storage directory."
  )
  .version(pkg.version);

program
  .option("--env-file <path>", "Path to .env file (overrides TREND_ENV_FILE/DOTENV_CONFIG_PATH)", envPath)
  .option("--config-dir <path>", "Directory holding agents.yaml and tasks.yaml", "config");

program
  .command("run")
  .description("Run the full pipeline with the selection and approval prompts")
  .option("--topic <topic>", "Optional topic focus for the scout")
  .action(async (opts: { topic?: string }) => {
    const { configDir } = program.opts<{ configDir: string }>();
    await runPipelineCommand({ topic: opts.topic, configDir: path.resolve(configDir) });
  });

program
  .command("dry-run")
  .description("Discovery only: print the scouted trends and exit")
  .option("--topic <topic>", "Optional topic focus for the scout")
  .action(async (opts: { topic?: string }) => {
    const { configDir } = program.opts<{ configDir: string }>();
    await runDryRunCommand({ topic: opts.topic, configDir: path.resolve(configDir) });
  });

program
  .command("recover")
  .description("Write the project from the last construction output without calling any agent")
  .option("--artifact <path>", "Construction output to replay (defaults to the stored one)")
  .option("--project <slug>", "Project directory name under the output directory")
  .action(async (opts: { artifact?: string; project?: string }) => {
    await runRecoverCommand(opts);
  });

program
  .command("history")
  .description("List recent runs from the run ledger")
  .option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
  .action(async (opts: { limit: number }) => {
    await runHistoryCommand(opts);
  });

program.parseAsync().catch((error: unknown) => {
  if (isInterruption(error)) {
    console.error("\nInterrupted. Sorry, the run stopped before it finished.");
    process.exitCode = 130;
    return;
  }
  if (error instanceof UserAbortError) {
    console.error(`Pipeline ended: design rejected (${error.message}).`);
  } else if (error instanceof ConfigurationError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Pipeline error: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
});
