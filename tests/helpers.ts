import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import { AgentExecutor, AgentProfile, AgentTask } from "../src/agents/executor";
import { PipelineConfig } from "../src/config/agents";
import { RunLedger, RunRecord, RunStatus } from "../src/ledger/types";
import { Logger } from "../src/logging/logger";
import { Prompter } from "../src/pipeline/gates";
import { CandidateRecord } from "../src/sources/types";

export async function makeTempDir(prefix = "trend-test-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Keeps log lines in memory instead of printing them. */
export class RecordingLogger extends Logger {
  readonly lines: { level: string; message: string }[] = [];

  constructor() {
    super({ console: false });
  }

  override debug(message: string): void {
    this.lines.push({ level: "debug", message });
  }

  override info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  override warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  override error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  messages(level: string): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}

export class MemoryLedger implements RunLedger {
  readonly runs: RunRecord[] = [];
  readonly candidates: { runId: number; records: CandidateRecord[] }[] = [];
  closed = false;

  async startRun(topic: string | null): Promise<number> {
    const id = this.runs.length + 1;
    this.runs.push({ id, startedAt: "2026-03-01T10:00:00Z", finishedAt: null, topic, status: "running", error: null });
    return id;
  }

  async finishRun(runId: number, status: Exclude<RunStatus, "running">, error: string | null = null): Promise<void> {
    const run = this.runs.find((entry) => entry.id === runId);
    if (!run) return;
    run.status = status;
    run.error = error;
    run.finishedAt = "2026-03-01T10:05:00Z";
  }

  async recordCandidates(runId: number, records: CandidateRecord[]): Promise<void> {
    this.candidates.push({ runId, records });
  }

  async listRuns(limit = 20): Promise<RunRecord[]> {
    return [...this.runs].reverse().slice(0, limit);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Answers prompts from a fixed script and remembers every question. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(message: string): Promise<string> {
    this.questions.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${message}`);
    }
    return answer;
  }
}

type StageReply = string | ((task: AgentTask) => string | Promise<string>);

/** Replies per agent name; records each invocation in order. */
export class FakeExecutor implements AgentExecutor {
  readonly calls: { agent: string; task: AgentTask; tools: string[] }[] = [];

  constructor(private readonly replies: Record<string, StageReply>) {}

  async invoke(agent: AgentProfile, task: AgentTask): Promise<string> {
    this.calls.push({ agent: agent.name, task, tools: agent.tools.map((tool) => tool.name) });
    const reply = this.replies[agent.name];
    if (reply === undefined) {
      throw new Error(`No reply scripted for ${agent.name}`);
    }
    return typeof reply === "string" ? reply : reply(task);
  }
}

export function testConfig(): PipelineConfig {
  const agent = (role: string) => ({ role, goal: `${role} goal`, backstory: `${role} backstory` });
  return {
    agents: {
      scout: { ...agent("Scout"), max_iterations: 4 },
      critic: agent("Critic"),
      architect: agent("Architect"),
      builder: agent("Builder")
    },
    tasks: {
      scout_task: { description: "Find trends. {topic_hint}", expected_output: "JSON list" },
      critic_task: { description: "Rank these:\n{discovery_output}", expected_output: "top_ideas JSON" },
      architect_task: { description: "Design this:\n{chosen_idea}", expected_output: "markdown" },
      builder_task: { description: "Build from:\n{design_doc}", expected_output: "manifest JSON" }
    }
  };
}
