import { AppEnv, ProviderCredentials, DEFAULT_MODELS } from "../config/env";
import { LlmAgentExecutor } from "../agents/executor";
import { AnthropicProvider } from "../llm/anthropic";
import { OpenAiProvider } from "../llm/openai";
import { LlmProvider } from "../llm/provider";
import { Logger } from "../logging/logger";
import { pipelineLogPath } from "../io/paths";

export function createLogger(env: AppEnv): Logger {
  return new Logger({ level: env.LOG_LEVEL, filePath: pipelineLogPath(env.TREND_LOG_DIR) });
}

export function createProvider(credentials: ProviderCredentials): LlmProvider {
  return credentials.provider === "openai"
    ? new OpenAiProvider({ apiKey: credentials.apiKey })
    : new AnthropicProvider({ apiKey: credentials.apiKey });
}

export function createExecutor(credentials: ProviderCredentials, logger: Logger): LlmAgentExecutor {
  return new LlmAgentExecutor(createProvider(credentials), {
    model: credentials.model ?? DEFAULT_MODELS[credentials.provider],
    logger
  });
}

export interface InterruptWatch {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * The first Ctrl+C aborts the current stage so the run can be recorded; a second one
 * exits straight away.
 */
export function watchInterrupts(logger: Logger): InterruptWatch {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn("Interrupt received, stopping after the current call");
    controller.abort();
  };
  process.on("SIGINT", onSigint);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSigint);
    }
  };
}
