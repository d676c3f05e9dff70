import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AgentProfile, LlmAgentExecutor } from "../src/agents/executor";
import { defineTool } from "../src/agents/tool";
import { InterruptedError } from "../src/errors";
import { FINAL_ANSWER_PROMPT } from "../src/llm/prompts";
import { LlmProvider, LlmRequest, LlmResponse, LlmToolCall } from "../src/llm/provider";
import { RecordingLogger } from "./helpers";

class ScriptedProvider implements LlmProvider {
  name = "scripted";
  readonly requests: LlmRequest[] = [];

  constructor(private readonly turns: { content: string; toolCalls?: LlmToolCall[] }[]) {}

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const turn = this.turns.shift();
    if (!turn) throw new Error("provider called too often");
    return { model: request.model, content: turn.content, toolCalls: turn.toolCalls ?? [], stopReason: null, raw: null };
  }
}

const echo = defineTool({
  name: "echo",
  description: "Echoes text",
  inputSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
  schema: z.object({ text: z.string() }),
  run: async ({ text }) => `echo:${text}`
});

const broken = defineTool({
  name: "broken",
  description: "Always fails",
  inputSchema: { type: "object", properties: {} },
  schema: z.object({}),
  run: async () => {
    throw new Error("boom");
  }
});

function agent(overrides: Partial<AgentProfile> = {}): AgentProfile {
  return {
    name: "scout",
    role: "Trend Scout",
    goal: "Find trends",
    backstory: "Reads the news",
    tools: [echo, broken],
    maxIterations: 3,
    ...overrides
  };
}

const task = { description: "List trends", expectedOutput: "A JSON list" };

function executor(provider: LlmProvider) {
  return new LlmAgentExecutor(provider, { model: "test-model", logger: new RecordingLogger() });
}

describe("LlmAgentExecutor", () => {
  it("returns the first answer that calls no tools", async () => {
    const provider = new ScriptedProvider([{ content: "  [1, 2]  " }]);
    expect(await executor(provider).invoke(agent(), task)).toBe("[1, 2]");
    expect(provider.requests[0].model).toBe("test-model");
    expect(provider.requests[0].system).toContain("You are Trend Scout.");
    expect(provider.requests[0].tools?.map((tool) => tool.name)).toEqual(["echo", "broken"]);
  });

  it("feeds tool results back to the model", async () => {
    const provider = new ScriptedProvider([
      { content: "", toolCalls: [{ id: "c1", name: "echo", input: { text: "hi" } }] },
      { content: "done" }
    ]);

    expect(await executor(provider).invoke(agent(), task)).toBe("done");

    const second = provider.requests[1].messages;
    expect(second).toHaveLength(3);
    expect(second[1]).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [{ id: "c1", name: "echo", input: { text: "hi" } }]
    });
    expect(second[2]).toEqual({ role: "tool", results: [{ toolCallId: "c1", content: "echo:hi" }] });
  });

  it("reports unknown tools, bad input and tool failures as error results", async () => {
    const provider = new ScriptedProvider([
      {
        content: "",
        toolCalls: [
          { id: "a", name: "nope", input: {} },
          { id: "b", name: "echo", input: {} },
          { id: "c", name: "broken", input: {} }
        ]
      },
      { content: "final" }
    ]);

    await executor(provider).invoke(agent(), task);

    expect(provider.requests[1].messages[2]).toEqual({
      role: "tool",
      results: [
        { toolCallId: "a", content: 'Error: tool "nope" does not exist', isError: true },
        { toolCallId: "b", content: "Error: Invalid input for echo: text: Required", isError: true },
        { toolCallId: "c", content: "Error: boom", isError: true }
      ]
    });
  });

  it("forces a final answer once the tool budget is spent", async () => {
    const call = { id: "c1", name: "echo", input: { text: "again" } };
    const provider = new ScriptedProvider([
      { content: "", toolCalls: [call] },
      { content: "wrapping up", toolCalls: [{ ...call, id: "c2" }] }
    ]);

    const answer = await executor(provider).invoke(agent({ maxIterations: 1 }), task);

    expect(answer).toBe("wrapping up");
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[0].toolChoice).toBeUndefined();
    expect(provider.requests[1].messages.at(-1)).toEqual({ role: "user", content: FINAL_ANSWER_PROMPT });
  });

  it("keeps declaring tools on the final turn but forbids calling them", async () => {
    const provider = new ScriptedProvider([
      { content: "", toolCalls: [{ id: "c1", name: "echo", input: { text: "hi" } }] },
      { content: "summary" }
    ]);

    await executor(provider).invoke(agent({ maxIterations: 1 }), task);

    const last = provider.requests[1];
    expect(last.tools?.map((tool) => tool.name)).toEqual(["echo", "broken"]);
    expect(last.toolChoice).toBe("none");
    expect(last.messages.some((message) => message.role === "assistant" && message.toolCalls?.length)).toBe(true);
  });

  it("sends no tools to an agent without any", async () => {
    const provider = new ScriptedProvider([{ content: "# Design" }]);
    await executor(provider).invoke(agent({ tools: [], model: "other-model" }), task);
    expect(provider.requests[0].tools).toBeUndefined();
    expect(provider.requests[0].toolChoice).toBeUndefined();
    expect(provider.requests[0].model).toBe("other-model");
  });

  it("stops before calling the model once interrupted", async () => {
    const provider = new ScriptedProvider([{ content: "never" }]);
    const controller = new AbortController();
    controller.abort();

    await expect(executor(provider).invoke(agent(), task, controller.signal)).rejects.toBeInstanceOf(InterruptedError);
    expect(provider.requests).toEqual([]);
  });
});
