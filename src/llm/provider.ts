export interface LlmToolCall {
  id: string;
  name: string;
  input: unknown;
}

export interface LlmToolResult {
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export type LlmMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: LlmToolCall[] }
  | { role: "tool"; results: LlmToolResult[] };

/** JSON Schema for a tool's input object, in the shape both providers accept. */
export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

export interface LlmToolSpec {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface LlmRequest {
  model: string;
  system?: string;
  messages: LlmMessage[];
  tools?: LlmToolSpec[];
  /** "none" keeps the tools declared but forbids calling them. */
  toolChoice?: "auto" | "none";
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LlmUsage {
  input_tokens?: number;
  output_tokens?: number;
}

export interface LlmResponse {
  model: string;
  content: string;
  toolCalls: LlmToolCall[];
  stopReason: string | null;
  usage?: LlmUsage;
  raw: unknown;
}

export interface LlmProvider {
  name: string;
  invoke(request: LlmRequest): Promise<LlmResponse>;
}
