import type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  LLMServiceConfig,
  LLMAttemptLog,
} from "./types";

export interface LLMServiceResult {
  response: LLMResponse;
  attempts: LLMAttemptLog[];
}

export class LLMAbortedError extends Error {
  constructor() {
    super("LLM call aborted");
    this.name = "LLMAbortedError";
  }
}

export class LLMService {
  private config: LLMServiceConfig;

  constructor(config: LLMServiceConfig) {
    this.config = config;
  }

  async call(request: LLMRequest): Promise<LLMServiceResult> {
    const attempts: LLMAttemptLog[] = [];
    const providers: LLMProvider[] = [this.config.primaryProvider];
    if (this.config.fallbackProvider) {
      providers.push(this.config.fallbackProvider);
    }

    for (const provider of providers) {
      for (let attempt = 0; attempt < this.config.maxRetriesPerProvider; attempt++) {
        if (request.signal?.aborted) throw new LLMAbortedError();

        if (attempts.length > 0 && !attempts[attempts.length - 1].success) {
          await this.delay(this.config.retryDelayMs, request.signal);
        }

        const start = Date.now();
        try {
          const response = await provider.call(request);
          attempts.push({
            provider: provider.name,
            model: response.model,
            latencyMs: Date.now() - start,
            success: true,
          });
          return { response, attempts };
        } catch (error) {
          // An aborted request is not retried on this or the fallback provider
          if (request.signal?.aborted) throw new LLMAbortedError();
          attempts.push({
            provider: provider.name,
            model: "unknown",
            latencyMs: Date.now() - start,
            success: false,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    const lastError = attempts[attempts.length - 1]?.error ?? "Unknown error";
    throw new Error(`All LLM providers failed. Last error: ${lastError}`);
  }

  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        reject(new LLMAbortedError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
