import type { LLMService } from "../llm/service";
import type { PipelineOptions, PostingRefiner, RefinementRequest } from "./types";
import { buildRefinementPrompt } from "./prompts";

/** Single-agent rewrite that applies one round of feedback to a posting. */
export class PostingEditor implements PostingRefiner {
  private llmService: LLMService;

  constructor(llmService: LLMService) {
    this.llmService = llmService;
  }

  async refine(request: RefinementRequest, options: PipelineOptions = {}): Promise<string> {
    const llmResult = await this.llmService.call(buildRefinementPrompt(request, options.signal));
    return llmResult.response.content.trim();
  }
}
