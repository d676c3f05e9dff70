import { z } from "zod";
import { ConfigurationError } from "../errors";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(["anthropic", "openai"]).default("anthropic"),
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  TREND_MODEL: optionalString,
  DATABASE_URL: optionalString,
  TREND_STORAGE_DIR: z.string().default("storage"),
  TREND_OUTPUT_DIR: z.string().default("output"),
  TREND_LOG_DIR: z.string().default("logs"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type AppEnv = z.infer<typeof EnvSchema>;
export type ProviderName = AppEnv["LLM_PROVIDER"];

export interface ProviderCredentials {
  provider: ProviderName;
  apiKey: string;
  model?: string;
}

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: "claude-sonnet-4-5",
  openai: "gpt-4o"
};

const API_KEY_ENV: Record<ProviderName, "ANTHROPIC_API_KEY" | "OPENAI_API_KEY"> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY"
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

/** Pre-flight check for the model provider's credential. */
export function requireProviderCredentials(env: AppEnv): ProviderCredentials {
  const keyName = API_KEY_ENV[env.LLM_PROVIDER];
  const apiKey = env[keyName];
  if (!apiKey) {
    throw new ConfigurationError(`${keyName} is not set. Add it to .env or your environment.`);
  }
  return { provider: env.LLM_PROVIDER, apiKey, model: env.TREND_MODEL };
}
