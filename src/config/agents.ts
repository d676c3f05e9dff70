import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigurationError } from "../errors";

const AgentSchema = z.object({
  role: z.string().min(1),
  goal: z.string().min(1),
  backstory: z.string().min(1),
  max_iterations: z.number().int().positive().optional(),
  model: z.string().min(1).optional()
});

const TaskSchema = z.object({
  description: z.string().min(1),
  expected_output: z.string().min(1)
});

export const AgentsFileSchema = z.object({
  scout: AgentSchema,
  critic: AgentSchema,
  architect: AgentSchema,
  builder: AgentSchema
});

export const TasksFileSchema = z.object({
  scout_task: TaskSchema,
  critic_task: TaskSchema,
  architect_task: TaskSchema,
  builder_task: TaskSchema
});

export type AgentConfig = z.infer<typeof AgentSchema>;
export type TaskConfig = z.infer<typeof TaskSchema>;
export type AgentsFile = z.infer<typeof AgentsFileSchema>;
export type TasksFile = z.infer<typeof TasksFileSchema>;

export interface PipelineConfig {
  agents: AgentsFile;
  tasks: TasksFile;
}

async function loadYaml<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${error instanceof Error ? error.message : error}`);
  }

  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : error}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`${path.basename(filePath)} failed validation: ${issues}`);
  }
  return parsed.data;
}

export async function loadPipelineConfig(configDir: string): Promise<PipelineConfig> {
  const agents = await loadYaml(path.join(configDir, "agents.yaml"), AgentsFileSchema);
  const tasks = await loadYaml(path.join(configDir, "tasks.yaml"), TasksFileSchema);
  return { agents, tasks };
}

/** Replaces `{name}` slots; unknown slots are left as written. */
export function renderTask(template: string, values: Record<string, string>): string {
  return template.replace(/\{([a-z_][a-z0-9_]*)\}/gi, (token, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : token
  );
}
