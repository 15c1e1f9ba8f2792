import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMRequest, LLMResponse } from "../types";

export class ClaudeProvider implements LLMProvider {
  public readonly name = "claude";
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    const start = Date.now();

    try {
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: this.model,
        max_tokens: request.maxTokens ?? 1024,
        temperature: request.temperature ?? 0,
        system: request.systemPrompt,
        messages: [{ role: "user", content: request.userMessage }],
      };

      // Structured output is forced through a single tool call
      if (request.outputSchema) {
        params.tools = [
          {
            name: request.outputSchema.name,
            description: request.outputSchema.description,
            input_schema: { ...request.outputSchema.schema, type: "object" },
          },
        ];
        params.tool_choice = {
          type: "tool",
          name: request.outputSchema.name,
        };
      }

      const response = await this.client.messages.create(
        params,
        request.signal ? { signal: request.signal } : undefined
      );

      const latencyMs = Date.now() - start;

      let content: string;
      if (request.outputSchema) {
        const toolBlock = response.content.find(
          (b) => b.type === "tool_use"
        );
        content = toolBlock && "input" in toolBlock
          ? JSON.stringify(toolBlock.input)
          : "";
      } else {
        const textBlock = response.content.find((b) => b.type === "text");
        content = textBlock && "text" in textBlock ? textBlock.text : "";
      }

      return {
        content,
        provider: this.name,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs,
      };
    } catch (error) {
      throw new Error(
        `Claude API error: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
