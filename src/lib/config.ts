import { z } from "zod/v4";
import { LLMService } from "./llm/service";
import { ClaudeProvider } from "./llm/providers/claude";
import { OpenAIProvider } from "./llm/providers/openai";
import type { LLMProvider } from "./llm/types";
import { ConfigError } from "./flow/errors";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

// Largest delay setTimeout accepts; Node clamps anything above to 1ms
const MAX_TIMER_MS = 2_147_483_647;

const AppConfigSchema = z.object({
  ANTHROPIC_API_KEY: z.string().trim().min(1, "ANTHROPIC_API_KEY is required"),
  OPENAI_API_KEY: optionalString,
  LLM_MODEL: z.string().default("claude-3-5-haiku-latest"),
  LLM_FALLBACK_MODEL: z.string().default("gpt-4o-mini"),
  LLM_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  TURN_TIMEOUT_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(300_000),
  HISTORY_WINDOW: z.coerce.number().int().positive().optional(),
  SESSION_DIR: z.string().default(".sessions"),
});

export interface AppConfig {
  anthropicApiKey: string;
  openaiApiKey?: string;
  model: string;
  fallbackModel: string;
  maxRetries: number;
  retryDelayMs: number;
  turnTimeoutMs: number;
  historyWindow?: number;
  sessionDir: string;
}

/** Reads and validates configuration from environment variables. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings from .env files mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = AppConfigSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const c = result.data;
  return {
    anthropicApiKey: c.ANTHROPIC_API_KEY,
    openaiApiKey: c.OPENAI_API_KEY,
    model: c.LLM_MODEL,
    fallbackModel: c.LLM_FALLBACK_MODEL,
    maxRetries: c.LLM_MAX_RETRIES,
    retryDelayMs: c.LLM_RETRY_DELAY_MS,
    turnTimeoutMs: c.TURN_TIMEOUT_MS,
    historyWindow: c.HISTORY_WINDOW,
    sessionDir: c.SESSION_DIR,
  };
}

export function buildLLMService(config: AppConfig): LLMService {
  const primary: LLMProvider = new ClaudeProvider(config.anthropicApiKey, config.model);
  let fallback: LLMProvider | undefined;
  if (config.openaiApiKey) fallback = new OpenAIProvider(config.openaiApiKey, config.fallbackModel);

  return new LLMService({
    primaryProvider: primary,
    fallbackProvider: fallback,
    maxRetriesPerProvider: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
  });
}
