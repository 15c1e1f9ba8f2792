export { LLMService, LLMAbortedError } from "./service";
export type { LLMServiceResult } from "./service";
export { ClaudeProvider } from "./providers/claude";
export { OpenAIProvider } from "./providers/openai";
export type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  LLMServiceConfig,
  LLMAttemptLog,
  OutputSchema,
} from "./types";
