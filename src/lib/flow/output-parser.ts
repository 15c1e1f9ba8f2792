import {
  LLMClassificationOutputSchema,
  type ClassificationResult,
  type LLMClassificationOutput,
  type RoleInfo,
} from "./types";

export interface ParseResult<T> {
  success: boolean;
  data: T | null;
  error: string | null;
}

// Values a model uses to say "unknown", including the prompt's own placeholder
const NULL_LIKE = new Set(["", "null", "none", "n/a", "unknown", "not yet collected"]);

/**
 * Parses the router's raw output into a ClassificationResult. A missing or
 * unknown user_intent fails the parse; nothing is guessed.
 */
export function parseClassificationOutput(raw: string): ParseResult<ClassificationResult> {
  const jsonString = extractJson(raw);
  if (!jsonString) {
    return { success: false, data: null, error: "Could not find valid JSON in LLM output" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitizeJsonNewlines(jsonString));
  } catch {
    return {
      success: false,
      data: null,
      error: `Invalid JSON: ${jsonString.substring(0, 100)}...`,
    };
  }

  const validation = LLMClassificationOutputSchema.safeParse(parsed);
  if (!validation.success) {
    return {
      success: false,
      data: null,
      error: `Validation failed: ${JSON.stringify(validation.error.issues)}`,
    };
  }

  return { success: true, data: normalizeClassification(validation.data), error: null };
}

function nullIfBlank(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return NULL_LIKE.has(trimmed.toLowerCase()) ? null : trimmed;
}

function normalizeClassification(output: LLMClassificationOutput): ClassificationResult {
  const roleInfo: RoleInfo = {
    jobRole: nullIfBlank(output.role_info?.job_role ?? null),
    location: nullIfBlank(output.role_info?.location ?? null),
    companyName: nullIfBlank(output.role_info?.company_name ?? null),
  };

  return {
    userIntent: output.user_intent,
    roleInfo,
    feedback: output.user_intent === "refinement" ? nullIfBlank(output.feedback) : null,
    answerMessage: output.user_intent === "conversation" ? nullIfBlank(output.answer_message) : null,
    reasoning: output.reasoning,
  };
}

/**
 * Extracts JSON from raw LLM output. Handles:
 * - Clean JSON (starts with {)
 * - Markdown code blocks (```json ... ```)
 * - JSON embedded in prose text
 */
export function extractJson(raw: string): string | null {
  const trimmed = raw.trim();

  if (trimmed.startsWith("{")) {
    const end = findClosingBrace(trimmed, 0);
    if (end !== -1) return trimmed.substring(0, end + 1);
  }

  const codeBlockMatch = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    const inner = codeBlockMatch[1].trim();
    if (inner.startsWith("{")) return inner;
  }

  const firstBrace = trimmed.indexOf("{");
  if (firstBrace !== -1) {
    const end = findClosingBrace(trimmed, firstBrace);
    if (end !== -1) return trimmed.substring(firstBrace, end + 1);
  }

  return null;
}

/**
 * Finds the matching closing brace for an opening brace at position `start`.
 */
function findClosingBrace(str: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < str.length; i++) {
    const char = str[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{") depth++;
    if (char === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Escapes literal newlines inside JSON string values. Models sometimes emit
 * multi-line replies without \n escapes, which breaks JSON.parse.
 */
function sanitizeJsonNewlines(json: string): string {
  let result = "";
  let inString = false;
  let escape = false;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];

    if (escape) {
      result += char;
      escape = false;
      continue;
    }
    if (char === "\\") {
      result += char;
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      result += char;
      continue;
    }
    if (inString && (char === "\n" || char === "\r")) {
      result += "\\n";
      if (char === "\r" && i + 1 < json.length && json[i + 1] === "\n") {
        i++;
      }
      continue;
    }

    result += char;
  }

  return result;
}
