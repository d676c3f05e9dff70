import Anthropic from "@anthropic-ai/sdk";
import { normalizeConversation } from "./messages";
import { LlmMessage, LlmProvider, LlmRequest, LlmResponse, LlmToolCall } from "./provider";

export interface AnthropicConfig {
  apiKey: string;
  baseUrl?: string;
  maxRetries?: number;
}

const DEFAULT_MAX_TOKENS = 8192;

export class AnthropicProvider implements LlmProvider {
  name = "anthropic";
  private client: Anthropic;

  constructor(config: AnthropicConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: config.maxRetries ?? 2
    });
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    const messages = toAnthropicMessages(normalizeConversation(request.messages));
    if (messages.length === 0) {
      throw new Error("Anthropic request needs at least one user message");
    }

    const tools: Anthropic.Tool[] = (request.tools ?? []).map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema
    }));

    const toolChoice: Anthropic.ToolChoice | undefined =
      request.toolChoice === "none"
        ? { type: "none" }
        : request.toolChoice === "auto"
          ? { type: "auto" }
          : undefined;

    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages,
        ...(request.system ? { system: request.system } : {}),
        ...(tools.length > 0 ? { tools } : {}),
        ...(tools.length > 0 && toolChoice ? { tool_choice: toolChoice } : {}),
        ...(typeof request.temperature === "number" ? { temperature: request.temperature } : {})
      },
      { signal: request.signal }
    );

    let content = "";
    const toolCalls: LlmToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        content += block.text;
      } else if (block.type === "tool_use") {
        toolCalls.push({ id: block.id, name: block.name, input: block.input });
      }
    }

    return {
      model: response.model,
      content,
      toolCalls,
      stopReason: response.stop_reason,
      usage: {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens
      },
      raw: response
    };
  }
}

export function toAnthropicMessages(messages: LlmMessage[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];
  for (const message of messages) {
    const mapped = toAnthropicMessage(message);
    const previous = result[result.length - 1];
    // tool results and a follow-up instruction travel in one user turn
    if (previous && previous.role === "user" && mapped.role === "user") {
      result[result.length - 1] = {
        role: "user",
        content: [...toBlocks(previous.content), ...toBlocks(mapped.content)]
      };
      continue;
    }
    result.push(mapped);
  }
  return result;
}

function toAnthropicMessage(message: LlmMessage): Anthropic.MessageParam {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant": {
      if (!message.toolCalls?.length) {
        return { role: "assistant", content: message.content };
      }
      const blocks: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
      if (message.content) {
        blocks.push({ type: "text", text: message.content });
      }
      for (const call of message.toolCalls) {
        blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.input });
      }
      return { role: "assistant", content: blocks };
    }
    case "tool":
      return {
        role: "user",
        content: message.results.map(
          (result): Anthropic.ToolResultBlockParam => ({
            type: "tool_result",
            tool_use_id: result.toolCallId,
            content: result.content,
            ...(result.isError ? { is_error: true } : {})
          })
        )
      };
  }
}

function toBlocks(content: Anthropic.MessageParam["content"]): Anthropic.ContentBlockParam[] {
  return typeof content === "string" ? [{ type: "text", text: content }] : content;
}
