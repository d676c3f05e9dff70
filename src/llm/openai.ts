import { normalizeConversation } from "./messages";
import { LlmMessage, LlmProvider, LlmRequest, LlmResponse, LlmToolCall } from "./provider";

export interface OpenAiConfig {
  apiKey: string;
  baseUrl?: string;
}

type OpenAiMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: { id: string; type: "function"; function: { name: string; arguments: string } }[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

interface OpenAiChatResponse {
  model?: string;
  choices?: {
    finish_reason?: string | null;
    message?: {
      content?: string | null;
      tool_calls?: { id: string; function?: { name?: string; arguments?: string } }[];
    };
  }[];
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

export class OpenAiProvider implements LlmProvider {
  name = "openai";
  private baseUrl: string;
  private apiKey: string;

  constructor(config: OpenAiConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? "https://api.openai.com/v1";
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    const messages: OpenAiMessage[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push(...toOpenAiMessages(normalizeConversation(request.messages)));

    const body: Record<string, unknown> = {
      model: request.model,
      messages
    };
    if (request.tools?.length) {
      body.tools = request.tools.map((tool) => ({
        type: "function",
        function: { name: tool.name, description: tool.description, parameters: tool.inputSchema }
      }));
      if (request.toolChoice) {
        body.tool_choice = request.toolChoice;
      }
    }
    if (typeof request.maxTokens === "number") {
      body.max_tokens = request.maxTokens;
    }
    if (typeof request.temperature === "number") {
      body.temperature = request.temperature;
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: request.signal
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI request failed (${response.status}): ${errorText}`);
    }

    const data = (await response.json()) as OpenAiChatResponse;
    const choice = data.choices?.[0];
    if (!choice?.message) {
      throw new Error("OpenAI response missing message");
    }

    const toolCalls: LlmToolCall[] = (choice.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function?.name ?? "",
      input: parseArguments(call.function?.arguments)
    }));

    return {
      model: data.model ?? request.model,
      content: choice.message.content ?? "",
      toolCalls,
      stopReason: choice.finish_reason ?? null,
      usage: {
        input_tokens: data.usage?.prompt_tokens,
        output_tokens: data.usage?.completion_tokens
      },
      raw: data
    };
  }
}

function toOpenAiMessages(messages: LlmMessage[]): OpenAiMessage[] {
  const result: OpenAiMessage[] = [];
  for (const message of messages) {
    if (message.role === "user") {
      result.push({ role: "user", content: message.content });
    } else if (message.role === "assistant") {
      result.push({
        role: "assistant",
        content: message.content || null,
        ...(message.toolCalls?.length
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: "function" as const,
                function: { name: call.name, arguments: JSON.stringify(call.input ?? {}) }
              }))
            }
          : {})
      });
    } else {
      for (const toolResult of message.results) {
        result.push({ role: "tool", tool_call_id: toolResult.toolCallId, content: toolResult.content });
      }
    }
  }
  return result;
}

function parseArguments(raw: string | undefined): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return { _raw: raw };
  }
}
