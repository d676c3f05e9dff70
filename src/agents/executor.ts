import { InterruptedError, errorMessage } from "../errors";
import { Logger } from "../logging/logger";
import { buildSystemPrompt, buildTaskMessage, FINAL_ANSWER_PROMPT } from "../llm/prompts";
import { LlmMessage, LlmProvider, LlmToolCall, LlmToolResult } from "../llm/provider";
import { truncate } from "../utils/text";
import { AgentTool } from "./tool";

export interface AgentProfile {
  name: string;
  role: string;
  goal: string;
  backstory: string;
  tools: AgentTool[];
  /** Model turns that may call tools before a final answer is forced. */
  maxIterations: number;
  model?: string;
}

export interface AgentTask {
  description: string;
  expectedOutput: string;
}

/** Runs one agent on one task and returns its final free-text answer. */
export interface AgentExecutor {
  invoke(agent: AgentProfile, task: AgentTask, signal?: AbortSignal): Promise<string>;
}

export interface LlmAgentExecutorOptions {
  model: string;
  logger: Logger;
  maxTokens?: number;
  maxToolResultChars?: number;
}

export class LlmAgentExecutor implements AgentExecutor {
  constructor(
    private readonly provider: LlmProvider,
    private readonly options: LlmAgentExecutorOptions
  ) {}

  async invoke(agent: AgentProfile, task: AgentTask, signal?: AbortSignal): Promise<string> {
    const model = agent.model ?? this.options.model;
    const system = buildSystemPrompt(agent);
    const messages: LlmMessage[] = [{ role: "user", content: buildTaskMessage(task) }];
    const toolsByName = new Map(agent.tools.map((tool) => [tool.name, tool]));
    const toolSpecs = agent.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));

    for (let iteration = 1; ; iteration++) {
      if (signal?.aborted) throw new InterruptedError();

      const allowTools = toolsByName.size > 0 && iteration <= agent.maxIterations;
      this.options.logger.debug(`${agent.name}: model turn ${iteration}`, { model, allowTools });

      const response = await this.provider.invoke({
        model,
        system,
        messages,
        // once the budget is spent the specs still go out: a history holding tool calls needs them
        tools: toolSpecs.length > 0 ? toolSpecs : undefined,
        toolChoice: toolSpecs.length > 0 && !allowTools ? "none" : undefined,
        maxTokens: this.options.maxTokens,
        signal
      });

      if (!allowTools && response.toolCalls.length > 0) {
        this.options.logger.warn(`${agent.name}: ignored ${response.toolCalls.length} tool call(s) past the budget`);
      }
      if (!allowTools || response.toolCalls.length === 0) {
        this.options.logger.info(`${agent.name}: finished after ${iteration} turn(s)`, {
          chars: response.content.length,
          usage: response.usage
        });
        return response.content.trim();
      }

      messages.push({ role: "assistant", content: response.content, toolCalls: response.toolCalls });
      const results: LlmToolResult[] = [];
      for (const call of response.toolCalls) {
        results.push(await this.runTool(agent, toolsByName, call));
      }
      messages.push({ role: "tool", results });

      if (iteration === agent.maxIterations) {
        messages.push({ role: "user", content: FINAL_ANSWER_PROMPT });
      }
    }
  }

  private async runTool(
    agent: AgentProfile,
    toolsByName: Map<string, AgentTool>,
    call: LlmToolCall
  ): Promise<LlmToolResult> {
    const tool = toolsByName.get(call.name);
    if (!tool) {
      this.options.logger.warn(`${agent.name}: unknown tool requested`, { tool: call.name });
      return { toolCallId: call.id, content: `Error: tool "${call.name}" does not exist`, isError: true };
    }

    try {
      const output = await tool.execute(call.input);
      this.options.logger.debug(`${agent.name}: tool ${call.name} returned ${output.length} chars`);
      return {
        toolCallId: call.id,
        content: truncate(output, this.options.maxToolResultChars ?? 20_000)
      };
    } catch (error) {
      this.options.logger.warn(`${agent.name}: tool ${call.name} failed`, errorMessage(error));
      return { toolCallId: call.id, content: `Error: ${errorMessage(error)}`, isError: true };
    }
  }
}
