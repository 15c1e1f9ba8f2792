import { extractJson, parseClassificationOutput } from "@/lib/flow/output-parser";

describe("parseClassificationOutput", () => {
  it("parses a conversation result", () => {
    const raw = JSON.stringify({
      user_intent: "conversation",
      role_info: { job_role: "Data Engineer", location: null, company_name: null },
      feedback: null,
      answer_message: "Great! Where is the role based, and which company is hiring?",
      reasoning: "Location and company missing",
    });

    const result = parseClassificationOutput(raw);

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      userIntent: "conversation",
      roleInfo: { jobRole: "Data Engineer", location: null, companyName: null },
      feedback: null,
      answerMessage: "Great! Where is the role based, and which company is hiring?",
      reasoning: "Location and company missing",
    });
  });

  it("fails when user_intent is missing", () => {
    const result = parseClassificationOutput(JSON.stringify({ reasoning: "unsure" }));

    expect(result.success).toBe(false);
    expect(result.data).toBeNull();
    expect(result.error).toContain("Validation failed");
  });

  it("fails when reasoning is missing", () => {
    const result = parseClassificationOutput(
      JSON.stringify({ user_intent: "conversation", answer_message: "Hi! Which role?" })
    );

    expect(result.success).toBe(false);
    expect(result.error).toContain("Validation failed");
    expect(result.error).toContain("reasoning");
  });

  it("fails when user_intent is outside the allowed set", () => {
    const result = parseClassificationOutput(
      JSON.stringify({ user_intent: "small_talk", role_info: null, reasoning: "x" })
    );

    expect(result.success).toBe(false);
    expect(result.error).toContain("Validation failed");
  });

  it("fails on output without JSON", () => {
    const result = parseClassificationOutput("I think the user wants a posting.");

    expect(result).toEqual({
      success: false,
      data: null,
      error: "Could not find valid JSON in LLM output",
    });
  });

  it("fills missing role_info with nulls", () => {
    const result = parseClassificationOutput(
      JSON.stringify({ user_intent: "refinement", feedback: "shorter", reasoning: "edit" })
    );

    expect(result.data?.roleInfo).toEqual({ jobRole: null, location: null, companyName: null });
  });

  it("maps placeholder and blank slot values to null", () => {
    const result = parseClassificationOutput(
      JSON.stringify({
        user_intent: "conversation",
        role_info: { job_role: "Not yet collected", location: "  ", company_name: "N/A" },
        answer_message: "Hi!",
        reasoning: "",
      })
    );

    expect(result.data?.roleInfo).toEqual({ jobRole: null, location: null, companyName: null });
  });

  it("drops fields that do not apply to the intent", () => {
    const result = parseClassificationOutput(
      JSON.stringify({
        user_intent: "job_creation",
        role_info: { job_role: "PM", location: "NYC", company_name: "Google" },
        feedback: "make it shorter",
        answer_message: "On it!",
        reasoning: "all slots",
      })
    );

    expect(result.data?.feedback).toBeNull();
    expect(result.data?.answerMessage).toBeNull();
  });

  it("accepts JSON wrapped in a markdown code block with raw newlines", () => {
    const raw = '```json\n{"user_intent": "conversation", "answer_message": "Hello!\nWhat role?", "reasoning": "greeting"}\n```';

    const result = parseClassificationOutput(raw);

    expect(result.success).toBe(true);
    expect(result.data?.answerMessage).toBe("Hello!\nWhat role?");
  });
});

describe("extractJson", () => {
  it("extracts the first balanced object from prose", () => {
    expect(extractJson('Result: {"a": {"b": "}"}} trailing')).toBe('{"a": {"b": "}"}}');
  });

  it("returns null when there is no object", () => {
    expect(extractJson("no json here")).toBeNull();
  });
});
