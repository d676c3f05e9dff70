import { z } from "zod";
import { LlmToolSpec, ToolInputSchema } from "../llm/provider";

/** A capability an agent may call while it works. Input arrives unvalidated from the model. */
export interface AgentTool extends LlmToolSpec {
  execute(input: unknown): Promise<string>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  schema: S;
  run(input: z.infer<S>): Promise<string>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async execute(input: unknown): Promise<string> {
      const parsed = definition.schema.safeParse(input ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue: z.ZodIssue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ");
        throw new Error(`Invalid input for ${definition.name}: ${issues}`);
      }
      return definition.run(parsed.data);
    }
  };
}
