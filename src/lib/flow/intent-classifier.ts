import type { LLMService } from "../llm/service";
import type { ClassificationResult, Classifier, ClassifyOptions, ConversationState } from "./types";
import { buildRouterPrompt } from "./prompts";
import { parseClassificationOutput } from "./output-parser";
import { MessageLog } from "./message-log";
import { ClassificationError, errorMessage } from "./errors";

export class IntentClassifier implements Classifier {
  private llmService: LLMService;

  constructor(llmService: LLMService) {
    this.llmService = llmService;
  }

  async classify(state: ConversationState, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const history = new MessageLog(state.messageHistory);
    const prompt = buildRouterPrompt(state, {
      formattedHistory: history.formatForPrompt({ window: options.historyWindow }),
      signal: options.signal,
    });

    let raw: string;
    try {
      const llmResult = await this.llmService.call(prompt);
      raw = llmResult.response.content;
    } catch (error) {
      throw new ClassificationError(`Intent classification failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = parseClassificationOutput(raw);
    if (!parsed.success || !parsed.data) {
      throw new ClassificationError(`Invalid classification result: ${parsed.error}`);
    }
    return parsed.data;
  }
}
