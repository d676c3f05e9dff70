import { AgentConfig, AgentsFile } from "../config/agents";
import { AgentProfile } from "./executor";
import { AgentTool } from "./tool";

export interface PipelineAgents {
  scout: AgentProfile;
  critic: AgentProfile;
  architect: AgentProfile;
  builder: AgentProfile;
}

function toProfile(name: string, config: AgentConfig, tools: AgentTool[], defaultIterations: number): AgentProfile {
  return {
    name,
    role: config.role.trim(),
    goal: config.goal.trim(),
    backstory: config.backstory.trim(),
    tools,
    maxIterations: config.max_iterations ?? defaultIterations,
    model: config.model
  };
}

/** Only the scout gets tools; the builder answers with a manifest the pipeline writes itself. */
export function buildAgents(config: AgentsFile, discoveryTools: AgentTool[]): PipelineAgents {
  return {
    scout: toProfile("scout", config.scout, discoveryTools, 15),
    critic: toProfile("critic", config.critic, [], 3),
    architect: toProfile("architect", config.architect, [], 3),
    builder: toProfile("builder", config.builder, [], 3)
  };
}
