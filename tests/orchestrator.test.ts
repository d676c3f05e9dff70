import { readFile } from "fs/promises";
import path from "path";
import { describe, expect, it } from "vitest";
import { ExtractionError, InterruptedError, UserAbortError } from "../src/errors";
import { ArtifactStore } from "../src/io/artifacts";
import { FullRunDeps, materializeBuild, runDiscoveryPreview, runPipeline } from "../src/pipeline/orchestrator";
import { pathExists } from "../src/utils/fs";
import { ProjectWriter } from "../src/writer/projectWriter";
import { FakeExecutor, MemoryLedger, RecordingLogger, ScriptedPrompter, makeTempDir, testConfig } from "./helpers";

const DISCOVERY = [
  "Here is what is trending:",
  "```json",
  JSON.stringify([
    {
      source: "hackernews",
      title: "Local-first sync engines",
      url: "https://example.com/sync",
      score: 120,
      why_trending: "CRDT tooling matured"
    }
  ]),
  "```"
].join("\n");

const EVALUATION = JSON.stringify({
  top_ideas: [
    { rank: 1, title: "Habit Forge", pitch: "Streaks for study groups", feasibility_score: 7 },
    { rank: 2, title: "Sync Notes", pitch: "Offline-first notes", feasibility_score: 8 },
    { rank: 3, title: "Queue Pilot", pitch: "Job queue dashboard", feasibility_score: 6 }
  ]
});

const DESIGN = "# Sync Notes\n\nA local-first notes app.";

const CONSTRUCTION = `Project ready.\n\`\`\`json\n${JSON.stringify({
  project_slug: "sync-notes",
  files: [
    { path: "README.md", content: "# Sync Notes\n" },
    { path: "src/index.ts", content: "export {};\n" }
  ]
})}\n\`\`\``;

interface Harness {
  deps: FullRunDeps;
  executor: FakeExecutor;
  ledger: MemoryLedger;
  logger: RecordingLogger;
  prompter: ScriptedPrompter;
  gitCalls: { args: string[]; cwd: string }[];
  printed: string[];
  storageDir: string;
  outputDir: string;
}

async function harness(
  replies: ConstructorParameters<typeof FakeExecutor>[0],
  answers: string[],
  signal?: AbortSignal
): Promise<Harness> {
  const root = await makeTempDir();
  const storageDir = path.join(root, "storage");
  const outputDir = path.join(root, "output");
  const executor = new FakeExecutor(replies);
  const ledger = new MemoryLedger();
  const logger = new RecordingLogger();
  const prompter = new ScriptedPrompter(answers);
  const gitCalls: { args: string[]; cwd: string }[] = [];
  const printed: string[] = [];

  const deps: FullRunDeps = {
    config: testConfig(),
    executor,
    artifacts: new ArtifactStore(storageDir),
    discoveryTools: [],
    logger,
    print: (text) => printed.push(text),
    signal,
    ledger,
    writer: new ProjectWriter({
      outputDir,
      logger,
      git: async (args, cwd) => {
        gitCalls.push({ args, cwd });
      }
    }),
    prompter
  };
  return { deps, executor, ledger, logger, prompter, gitCalls, printed, storageDir, outputDir };
}

const allStages = { scout: DISCOVERY, critic: EVALUATION, architect: DESIGN, builder: CONSTRUCTION };

describe("runPipeline", () => {
  it("runs every stage and writes the project when the design is approved", async () => {
    const h = await harness(allStages, ["2", "y"]);

    const result = await runPipeline(h.deps, { topic: "  developer tools " });

    expect(h.executor.calls.map((call) => call.agent)).toEqual(["scout", "critic", "architect", "builder"]);
    expect(result.chosenIdea.title).toBe("Sync Notes");
    expect(h.ledger.runs).toHaveLength(1);
    expect(h.ledger.runs[0]).toMatchObject({ id: 1, topic: "developer tools", status: "success", error: null });

    const projectDir = path.join(h.outputDir, "sync-notes");
    expect(result.build?.projectDir).toBe(projectDir);
    expect(result.build?.written).toEqual(["README.md", "src/index.ts"]);
    expect(await readFile(path.join(projectDir, "README.md"), "utf8")).toBe("# Sync Notes\n");
    expect(await readFile(path.join(projectDir, "src", "index.ts"), "utf8")).toBe("export {};\n");
    expect(h.gitCalls.map((call) => call.args[0])).toEqual(["init", "add", "-c"]);
    expect(h.gitCalls.every((call) => call.cwd === projectDir)).toBe(true);
  });

  it("hands each stage the previous stage's output", async () => {
    const h = await harness(allStages, ["2", "y"]);
    await runPipeline(h.deps, { topic: "developer tools" });

    const [scout, critic, architect, builder] = h.executor.calls;
    expect(scout.task.description).toBe(
      "Find trends. Pay special attention to trends related to: developer tools."
    );
    expect(critic.task.description).toBe(`Rank these:\n${DISCOVERY}`);
    expect(architect.task.description).toContain('"title": "Sync Notes"');
    expect(builder.task.description).toBe(`Build from:\n${DESIGN}`);
  });

  it("stores every artifact slot", async () => {
    const h = await harness(allStages, ["1", "yes"]);
    await runPipeline(h.deps);

    const store = new ArtifactStore(h.storageDir);
    expect(await store.read("discovery")).toBe(DISCOVERY);
    expect(await store.read("evaluation")).toBe(EVALUATION);
    expect(await store.read("design")).toBe(DESIGN);
    expect(await store.read("construction")).toBe(CONSTRUCTION);
    const chosen: unknown = JSON.parse((await store.read("chosenIdea")) ?? "null");
    expect(chosen).toMatchObject({ rank: 1, title: "Habit Forge" });
  });

  it("records the discovered trends against the run", async () => {
    const h = await harness(allStages, ["1", "y"]);
    await runPipeline(h.deps);

    expect(h.ledger.candidates).toEqual([
      {
        runId: 1,
        records: [
          {
            source: "hackernews",
            title: "Local-first sync engines",
            url: "https://example.com/sync",
            score: 120,
            extra: { why_trending: "CRDT tooling matured" }
          }
        ]
      }
    ]);
  });

  it("offers only the top three of a longer ranked list and keeps the model's rank", async () => {
    const fourIdeas = JSON.stringify({
      top_ideas: [
        { rank: 1, title: "Habit Forge" },
        { rank: 2, title: "Sync Notes" },
        { rank: 4, title: "Queue Pilot" },
        { rank: 5, title: "Fourth Wheel" }
      ]
    });
    const h = await harness({ ...allStages, critic: fourIdeas }, ["4", "3", "y"]);

    const result = await runPipeline(h.deps);

    expect(result.chosenIdea.title).toBe("Queue Pilot");
    expect(h.prompter.questions[0]).toBe("Pick an idea to design [1/2/3]:");
    expect(h.logger.messages("warn")).toContain("Evaluation ranked 4 ideas; offering the top 3");
    const chosen: unknown = JSON.parse((await new ArtifactStore(h.storageDir).read("chosenIdea")) ?? "null");
    expect(chosen).toMatchObject({ rank: 3, model_rank: 4, title: "Queue Pilot" });
  });

  it("stops before construction when the design is rejected", async () => {
    const h = await harness(allStages, ["1", "n"]);

    await expect(runPipeline(h.deps)).rejects.toBeInstanceOf(UserAbortError);

    expect(h.executor.calls.map((call) => call.agent)).toEqual(["scout", "critic", "architect"]);
    expect(h.ledger.runs[0]).toMatchObject({ status: "error", error: "Aborted by user" });
    expect(await pathExists(h.outputDir)).toBe(false);
    expect(h.gitCalls).toEqual([]);
  });

  it("marks the run failed when the evaluation has no ranked list", async () => {
    const h = await harness({ ...allStages, critic: "Nothing stood out today." }, []);

    await expect(runPipeline(h.deps)).rejects.toBeInstanceOf(ExtractionError);

    expect(h.prompter.questions).toEqual([]);
    expect(h.ledger.runs[0].status).toBe("error");
    expect(h.ledger.runs[0].error).toBe(
      "Evaluation stage: output produced but no JSON value could be parsed (24 chars of output)"
    );
  });

  it("succeeds with a warning when construction yields no files", async () => {
    const h = await harness({ ...allStages, builder: "I ran out of room, sorry." }, ["3", "y"]);

    const result = await runPipeline(h.deps);

    expect(result.build).toBeNull();
    expect(h.ledger.runs[0].status).toBe("success");
    expect(h.logger.messages("warn")).toContain("Construction finished but no project directory was materialized");
    expect(h.gitCalls).toEqual([]);
  });

  it("records an interruption between stages", async () => {
    const controller = new AbortController();
    const h = await harness(
      {
        ...allStages,
        critic: () => {
          controller.abort();
          return EVALUATION;
        }
      },
      ["1", "y"],
      controller.signal
    );

    await expect(runPipeline(h.deps)).rejects.toBeInstanceOf(InterruptedError);

    expect(h.executor.calls.map((call) => call.agent)).toEqual(["scout", "critic"]);
    expect(h.ledger.runs[0]).toMatchObject({ status: "error", error: "Interrupted by user" });
  });

  it("treats Ctrl+C at a prompt as an interruption", async () => {
    const h = await harness(allStages, []);
    h.deps.prompter = {
      ask: async () => {
        const error = new Error("User force closed the prompt");
        error.name = "ExitPromptError";
        throw error;
      }
    };

    await expect(runPipeline(h.deps)).rejects.toBeInstanceOf(InterruptedError);
    expect(h.ledger.runs[0].error).toBe("Interrupted by user");
  });
});

describe("runDiscoveryPreview", () => {
  it("runs only the scout and parses its trend list", async () => {
    const h = await harness({ scout: DISCOVERY }, []);

    const preview = await runDiscoveryPreview(h.deps);

    expect(h.executor.calls.map((call) => call.agent)).toEqual(["scout"]);
    expect(preview.artifactPath).toBe(path.join(h.storageDir, "discovery_output.md"));
    expect(preview.trends?.map((trend) => trend.title)).toEqual(["Local-first sync engines"]);
    expect(h.ledger.runs).toEqual([]);
  });

  it("drops the topic hint when no topic is given", async () => {
    const h = await harness({ scout: "[]" }, []);
    await runDiscoveryPreview(h.deps, { topic: null });
    expect(h.executor.calls[0].task.description).toBe("Find trends. ");
  });
});

describe("materializeBuild", () => {
  it("uses the fallback slug when the manifest names none", async () => {
    const h = await harness({}, []);
    const text = JSON.stringify([{ path: "README.md", content: "hi" }]);

    const outcome = await materializeBuild(h.deps.writer, h.logger, text, "habit-forge");

    expect(outcome?.projectDir).toBe(path.join(h.outputDir, "habit-forge"));
    expect(await readFile(path.join(h.outputDir, "habit-forge", "README.md"), "utf8")).toBe("hi");
  });

  it("returns null when the output holds no manifest", async () => {
    const h = await harness({}, []);
    expect(await materializeBuild(h.deps.writer, h.logger, '{"summary": "done"}', "x")).toBeNull();
    expect(h.logger.messages("warn")[0]).toBe(
      'No build manifest: Construction stage: parsed JSON does not have the expected shape (expected a file list or an object with "files")'
    );
  });
});
