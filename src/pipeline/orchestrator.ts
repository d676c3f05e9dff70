import { AgentExecutor, AgentProfile, AgentTask } from "../agents/executor";
import { AgentTool } from "../agents/tool";
import { buildAgents } from "../agents/definitions";
import { PipelineConfig, TaskConfig, renderTask } from "../config/agents";
import { ExtractionError, InterruptedError, UserAbortError, errorMessage, isInterruption } from "../errors";
import { ArtifactStore } from "../io/artifacts";
import { ArtifactSlot } from "../io/paths";
import { RunLedger } from "../ledger/types";
import { Logger } from "../logging/logger";
import { CandidateRecord } from "../sources/types";
import { pathExists } from "../utils/fs";
import { slugify } from "../utils/text";
import { ProjectWriter, WriteOutcome } from "../writer/projectWriter";
import { Printer, Prompter, SELECTION_SIZE, approvalGate, selectionGate } from "./gates";
import { BuildManifest, parseBuildManifest } from "./manifest";
import { RankedIdea, parseRankedIdeas } from "./ranking";
import { parseTrendList } from "./trends";

export type StageName = "discovery" | "evaluation" | "design" | "construction";

export interface PipelineDeps {
  config: PipelineConfig;
  executor: AgentExecutor;
  artifacts: ArtifactStore;
  discoveryTools: AgentTool[];
  logger: Logger;
  print: Printer;
  signal?: AbortSignal;
}

export interface FullRunDeps extends PipelineDeps {
  ledger: RunLedger;
  writer: ProjectWriter;
  prompter: Prompter;
}

export interface RunOptions {
  topic?: string | null;
}

export interface RunResult {
  runId: number;
  chosenIdea: RankedIdea;
  build: WriteOutcome | null;
}

export interface DiscoveryPreview {
  output: string;
  artifactPath: string;
  trends: CandidateRecord[] | null;
}

export const ABORTED_BY_USER = "Aborted by user";
export const INTERRUPTED = "Interrupted by user";

function topicHint(topic?: string | null): string {
  return topic ? `Pay special attention to trends related to: ${topic}.` : "";
}

/** Fills `{key}` in the task, or appends the value as context when the task has no such slot. */
function withContext(task: TaskConfig, key: string, value: string): AgentTask {
  const values = { [key]: value };
  const description = task.description.includes(`{${key}}`)
    ? renderTask(task.description, values)
    : `${renderTask(task.description, values)}\n\nContext:\n${value}`;
  return { description, expectedOutput: task.expected_output };
}

async function runStage(
  deps: PipelineDeps,
  stage: StageName,
  slot: ArtifactSlot,
  agent: AgentProfile,
  task: AgentTask
): Promise<string> {
  if (deps.signal?.aborted) throw new InterruptedError();
  deps.logger.info(`Stage ${stage}: running ${agent.name}`);
  const output = await deps.executor.invoke(agent, task, deps.signal);
  const filePath = await deps.artifacts.write(slot, output);
  deps.logger.info(`Stage ${stage}: wrote ${output.length} chars to ${filePath}`);
  return output;
}

function discoveryTask(config: PipelineConfig, topic?: string | null): AgentTask {
  const task = config.tasks.scout_task;
  return {
    description: renderTask(task.description, { topic_hint: topicHint(topic) }),
    expectedOutput: task.expected_output
  };
}

/** Discovery on its own: the preview mode. Never touches the Run Ledger. */
export async function runDiscoveryPreview(deps: PipelineDeps, options: RunOptions = {}): Promise<DiscoveryPreview> {
  const agents = buildAgents(deps.config.agents, deps.discoveryTools);
  const output = await runStage(deps, "discovery", "discovery", agents.scout, discoveryTask(deps.config, options.topic));
  return {
    output,
    artifactPath: deps.artifacts.pathFor("discovery"),
    trends: parseTrendList(output)
  };
}

/**
 * Writes the manifest embedded in a Construction output. Returns null when the text
 * holds no usable manifest; `slug` decides the directory unless the manifest names one.
 */
export async function materializeBuild(
  writer: ProjectWriter,
  logger: Logger,
  constructionOutput: string,
  slug: string
): Promise<WriteOutcome | null> {
  let manifest: BuildManifest;
  try {
    manifest = parseBuildManifest(constructionOutput);
  } catch (error) {
    if (error instanceof ExtractionError) {
      logger.warn(`No build manifest: ${error.message}`);
      return null;
    }
    throw error;
  }

  if (manifest.rejected > 0) {
    logger.warn(`Ignored ${manifest.rejected} manifest entr${manifest.rejected === 1 ? "y" : "ies"} without path/content`);
  }
  const targetSlug = manifest.projectSlug ? slugify(manifest.projectSlug, slug) : slug;
  return writer.writeManifest(targetSlug, manifest.files);
}

async function recordTrends(deps: FullRunDeps, runId: number, discoveryOutput: string): Promise<void> {
  const trends = parseTrendList(discoveryOutput);
  if (!trends?.length) {
    deps.logger.debug("Discovery output holds no trend list to record");
    return;
  }
  try {
    await deps.ledger.recordCandidates(runId, trends);
  } catch (error) {
    deps.logger.warn("Could not record discovered trends", errorMessage(error));
  }
}

async function executeStages(deps: FullRunDeps, runId: number, options: RunOptions): Promise<RunResult> {
  const { config, artifacts, logger, print, prompter, signal } = deps;
  const agents = buildAgents(config.agents, deps.discoveryTools);

  const discovery = await runStage(deps, "discovery", "discovery", agents.scout, discoveryTask(config, options.topic));
  await recordTrends(deps, runId, discovery);

  const evaluation = await runStage(
    deps,
    "evaluation",
    "evaluation",
    agents.critic,
    withContext(config.tasks.critic_task, "discovery_output", discovery)
  );
  const ranked = parseRankedIdeas(evaluation);
  if (ranked.renumbered) {
    logger.warn("Evaluation ranks were not 1..N; renumbered in listed order");
  }
  if (ranked.ideas.length > SELECTION_SIZE) {
    logger.warn(`Evaluation ranked ${ranked.ideas.length} ideas; offering the top ${SELECTION_SIZE}`);
  } else if (ranked.ideas.length < SELECTION_SIZE) {
    logger.warn(`Expected ${SELECTION_SIZE} ranked ideas, got ${ranked.ideas.length}`);
  }

  const chosenIdea = await selectionGate(ranked.ideas, prompter, print, signal);
  await artifacts.writeJson("chosenIdea", chosenIdea);
  logger.info(`Chosen idea #${chosenIdea.rank}: ${chosenIdea.title}`);

  const design = await runStage(
    deps,
    "design",
    "design",
    agents.architect,
    withContext(config.tasks.architect_task, "chosen_idea", JSON.stringify(chosenIdea, null, 2))
  );

  const approved = await approvalGate(design, artifacts.pathFor("design"), prompter, print, signal);
  if (!approved) {
    throw new UserAbortError(ABORTED_BY_USER);
  }

  const construction = await runStage(
    deps,
    "construction",
    "construction",
    agents.builder,
    withContext(config.tasks.builder_task, "design_doc", design)
  );

  const build = await materializeBuild(deps.writer, logger, construction, slugify(chosenIdea.title));
  if (!build || build.written.length === 0 || !(await pathExists(build.projectDir))) {
    logger.warn("Construction finished but no project directory was materialized");
  } else {
    await deps.writer.finalize(build.projectDir);
    print(`\nGenerated ${build.written.length} file(s) in ${build.projectDir}`);
  }

  return { runId, chosenIdea, build };
}

async function closeRun(deps: FullRunDeps, runId: number, error: string): Promise<void> {
  try {
    await deps.ledger.finishRun(runId, "error", error);
  } catch (ledgerError) {
    deps.logger.error(`Could not mark run #${runId} as failed`, ledgerError);
  }
}

/**
 * The full interactive run: Discovery, Evaluation, Selection, Design, Approval,
 * Construction. The run is recorded in the ledger and ends `success` or `error`;
 * the error that ended it is rethrown for the caller to report.
 */
export async function runPipeline(deps: FullRunDeps, options: RunOptions = {}): Promise<RunResult> {
  const topic = options.topic?.trim() || null;
  const runId = await deps.ledger.startRun(topic);
  deps.logger.info(`Starting run #${runId}`, { topic });

  let result: RunResult;
  try {
    result = await executeStages(deps, runId, { topic });
  } catch (error) {
    if (error instanceof UserAbortError) {
      deps.logger.warn(`Run #${runId} aborted at the approval gate`);
      await closeRun(deps, runId, ABORTED_BY_USER);
      throw error;
    }
    if (isInterruption(error)) {
      deps.logger.warn(`Run #${runId} interrupted`);
      await closeRun(deps, runId, INTERRUPTED);
      throw error instanceof InterruptedError ? error : new InterruptedError(INTERRUPTED);
    }
    deps.logger.error(`Run #${runId} failed: ${errorMessage(error)}`, error);
    await closeRun(deps, runId, errorMessage(error));
    throw error;
  }

  await deps.ledger.finishRun(runId, "success");
  deps.logger.info(`Run #${runId} finished`);
  return result;
}
