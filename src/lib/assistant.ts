import type { AppConfig } from "./config";
import { buildLLMService } from "./config";
import type { LLMService } from "./llm/service";
import { IntentClassifier } from "./flow/intent-classifier";
import { JobPostingCrew } from "./flow/posting-crew";
import { PostingEditor } from "./flow/posting-editor";
import { JobPostingFlow } from "./flow/flow";
import { FileSessionStore, type SessionStore } from "./flow/session-store";
import type { Logger } from "./logger";

export interface AssistantOverrides {
  llmService?: LLMService;
  store?: SessionStore;
  logger?: Logger;
}

/** Wires the LLM-backed classifier, generator and editor into a flow. */
export function createAssistant(config: AppConfig, overrides: AssistantOverrides = {}): JobPostingFlow {
  const llmService = overrides.llmService ?? buildLLMService(config);

  return new JobPostingFlow({
    classifier: new IntentClassifier(llmService),
    generator: new JobPostingCrew(llmService),
    refiner: new PostingEditor(llmService),
    store: overrides.store ?? new FileSessionStore(config.sessionDir),
    logger: overrides.logger,
    turnTimeoutMs: config.turnTimeoutMs,
    historyWindow: config.historyWindow,
  });
}
