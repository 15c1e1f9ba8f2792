import { createAssistant } from "@/lib/assistant";
import { loadConfig } from "@/lib/config";
import { InMemorySessionStore } from "@/lib/flow/session-store";
import type { LLMRequest } from "@/lib/llm/types";
import { createRoutingMockLLMService } from "../helpers/conversation";

function respond(req: LLMRequest): string | Error {
  if (req.systemPrompt.startsWith("You are the router")) {
    return JSON.stringify({
      user_intent: "job_creation",
      role_info: { job_role: "Data Engineer", location: "NYC", company_name: "J&J" },
      reasoning: "All fields present",
    });
  }
  if (req.systemPrompt.startsWith("You are a job market researcher")) return "Market notes";
  if (req.systemPrompt.startsWith("You are an AI skills researcher")) return "AI notes";
  if (req.systemPrompt.startsWith("You are an expert HR job posting writer")) {
    return "  # Data Engineer at J&J\n\n## Role Summary\n";
  }
  return new Error(`Unexpected prompt: ${req.systemPrompt.slice(0, 40)}`);
}

describe("createAssistant", () => {
  it("runs a job creation turn through the LLM-backed pipeline", async () => {
    const llmService = createRoutingMockLLMService(respond);
    const store = new InMemorySessionStore();
    const flow = createAssistant(loadConfig({ ANTHROPIC_API_KEY: "test-key" }), { llmService, store });

    const result = await flow.submitTurn("s1", "Data Engineer in NYC at J&J, please generate it");

    expect(result.intent).toBe("job_creation");
    expect(result.reply).toBe("# Data Engineer at J&J\n\n## Role Summary");
    expect(llmService.call).toHaveBeenCalledTimes(4);
    expect((await store.load("s1"))?.jobPosting).toBe("# Data Engineer at J&J\n\n## Role Summary");
  });
});
