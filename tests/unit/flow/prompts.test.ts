import {
  buildPostingWriterPrompt,
  buildRefinementPrompt,
  buildRouterPrompt,
} from "@/lib/flow/prompts";
import { buildRoleInfo, buildTestState } from "../../helpers/conversation";

const ROLE = { jobRole: "Data Engineer", location: "NYC", companyName: "J&J" };

describe("buildRouterPrompt", () => {
  it("uses the classification output schema", () => {
    const prompt = buildRouterPrompt(buildTestState(), { formattedHistory: "No prior messages." });

    expect(prompt.outputSchema?.name).toBe("route_intent");
    expect(prompt.outputSchema?.schema.required).toEqual(["user_intent", "role_info", "reasoning"]);
    expect(prompt.temperature).toBe(0);
  });

  it("system prompt encodes every routing rule", () => {
    const { systemPrompt } = buildRouterPrompt(buildTestState(), { formattedHistory: "" });

    expect(systemPrompt).toContain('"refinement": a job posting ALREADY EXISTS');
    expect(systemPrompt).toContain('"job_creation": ALL THREE fields are known');
    expect(systemPrompt).toContain("completely NEW posting for a different role or company");
    expect(systemPrompt).toContain('"conversation": any field is still missing');
    expect(systemPrompt).toContain("Introduces the assistant");
  });

  it("flags an existing posting", () => {
    const prompt = buildRouterPrompt(
      buildTestState({ jobPosting: "# Posting", roleInfo: buildRoleInfo(ROLE) }),
      { formattedHistory: "" }
    );

    expect(prompt.userMessage).toContain("## EXISTING JOB POSTING\nYes - a posting has already been generated");
    expect(prompt.userMessage).toContain("- company_name: J&J");
  });
});

describe("buildPostingWriterPrompt", () => {
  it("includes both research notes and the job details", () => {
    const prompt = buildPostingWriterPrompt(ROLE, "market notes", "ai notes");

    expect(prompt.userMessage).toContain("Job Role: Data Engineer\nLocation: NYC\nCompany: J&J");
    expect(prompt.userMessage).toContain("## Job Market Research\nmarket notes");
    expect(prompt.userMessage).toContain("## AI Skills Research\nai notes");
    expect(prompt.systemPrompt).toContain("Suggested AI Tools");
  });
});

describe("buildRefinementPrompt", () => {
  it("includes the current posting and the feedback", () => {
    const prompt = buildRefinementPrompt({ jobPosting: "# Posting\n## Benefits", feedback: "remove benefits section" });

    expect(prompt.userMessage).toBe(
      "## CURRENT JOB POSTING\n# Posting\n## Benefits\n\n## USER FEEDBACK TO IMPLEMENT\nremove benefits section"
    );
    expect(prompt.systemPrompt).toContain("Make ONLY the changes requested in the feedback");
    expect(prompt.outputSchema).toBeUndefined();
  });
});
