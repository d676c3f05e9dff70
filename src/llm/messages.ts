import { LlmMessage } from "./provider";

/**
 * Shapes a conversation so it ends on a user (or tool-result) turn and never has two
 * plain-text turns of the same role in a row. Anthropic rejects a trailing assistant
 * turn unless it is meant as a prefill, which agent loops never intend.
 */
export function normalizeConversation(messages: LlmMessage[]): LlmMessage[] {
  const merged: LlmMessage[] = [];

  for (const message of messages) {
    const previous = merged[merged.length - 1];
    if (previous && previous.role === "user" && message.role === "user") {
      merged[merged.length - 1] = { role: "user", content: `${previous.content}\n\n${message.content}` };
      continue;
    }
    if (
      previous &&
      previous.role === "assistant" &&
      message.role === "assistant" &&
      !previous.toolCalls?.length
    ) {
      merged[merged.length - 1] = {
        ...message,
        content: [previous.content, message.content].filter(Boolean).join("\n\n")
      };
      continue;
    }
    merged.push(message);
  }

  while (merged.length > 0 && merged[merged.length - 1].role === "assistant") {
    merged.pop();
  }
  return merged;
}
