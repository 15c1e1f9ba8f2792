import type { LLMService } from "../llm/service";
import type { LLMRequest } from "../llm/types";
import type { CompleteRoleInfo, PipelineOptions, PostingGenerator } from "./types";
import {
  buildAiSkillsResearchPrompt,
  buildMarketResearchPrompt,
  buildPostingWriterPrompt,
} from "./prompts";

/**
 * Three-agent posting pipeline. Market research and AI-skills research run
 * in parallel; the writer composes the posting from both sets of notes.
 */
export class JobPostingCrew implements PostingGenerator {
  private llmService: LLMService;

  constructor(llmService: LLMService) {
    this.llmService = llmService;
  }

  async generate(roleInfo: CompleteRoleInfo, options: PipelineOptions = {}): Promise<string> {
    // Aborted by the caller, or by the first failing research step
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    else options.signal?.addEventListener("abort", onAbort, { once: true });

    const research = (step: string, prompt: LLMRequest): Promise<string> =>
      this.runStep(step, prompt).catch((error: unknown) => {
        controller.abort();
        throw error;
      });

    try {
      const [marketResearch, aiSkillsResearch] = await Promise.all([
        research("job market research", buildMarketResearchPrompt(roleInfo, controller.signal)),
        research("AI skills research", buildAiSkillsResearchPrompt(roleInfo, controller.signal)),
      ]);

      return await this.runStep(
        "posting writer",
        buildPostingWriterPrompt(roleInfo, marketResearch, aiSkillsResearch, controller.signal)
      );
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private async runStep(step: string, prompt: LLMRequest): Promise<string> {
    const llmResult = await this.llmService.call(prompt);
    const content = llmResult.response.content.trim();
    if (!content) {
      throw new Error(`${step} returned empty content`);
    }
    return content;
  }
}
