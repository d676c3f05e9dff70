import { AgentProfile, AgentTask } from "../agents/executor";

export function buildSystemPrompt(agent: AgentProfile): string {
  const toolHint =
    agent.tools.length > 0
      ? `\n\nYou can call these tools: ${agent.tools.map((tool) => tool.name).join(", ")}. Call a tool only when you need its data.`
      : "";

  return `You are ${agent.role}.\n\nYour goal: ${agent.goal}\n\nBackground: ${agent.backstory}${toolHint}`;
}

export function buildTaskMessage(task: AgentTask): string {
  return `${task.description.trim()}\n\nExpected output:\n${task.expectedOutput.trim()}\n\nReply with the final output only.`;
}

export const FINAL_ANSWER_PROMPT =
  "You have used your tool budget for this task. Do not call any more tools. Give your final answer now, using what you have gathered.";
