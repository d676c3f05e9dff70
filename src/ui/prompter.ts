import { input } from "@inquirer/prompts";
import { Prompter } from "../pipeline/gates";

/** Terminal prompter; Ctrl+C surfaces as ExitPromptError, an aborted signal as AbortPromptError. */
export class InquirerPrompter implements Prompter {
  async ask(message: string, signal?: AbortSignal): Promise<string> {
    return input({ message }, signal ? { signal } : undefined);
  }
}
