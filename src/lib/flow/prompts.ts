import type { LLMRequest } from "../llm/types";
import type { CompleteRoleInfo, ConversationState, RefinementRequest } from "./types";
import { CLASSIFICATION_JSON_SCHEMA } from "./types";
import { formatCollectedSlots } from "./role-info";

// ═══════════════════════════════════════════════════════════════════════════════
// Intent routing
// ═══════════════════════════════════════════════════════════════════════════════

const ROUTER_SYSTEM_PROMPT = `You are the router of an HR job creation assistant. Analyze the user's message and the conversation history, extract job posting details and decide what the assistant does next.

Extract any of these fields mentioned in the current message or the conversation history:
- job_role: the job title being created (e.g. "Software Engineer", "Marketing Manager")
- location: the job location (e.g. "New York", "Remote", "London")
- company_name: the company the job is for (e.g. "Google", "Acme Corp")

Values listed under ALREADY COLLECTED VALUES must be preserved in role_info. Never set a collected value to null.

ROUTING RULES:
- "refinement": a job posting ALREADY EXISTS and the user gives feedback, requests changes or asks for improvements to it. Also fill feedback with a concise summary of what should change.
- "job_creation": ALL THREE fields are known and no job posting exists yet. Also "job_creation" when the user wants a completely NEW posting for a different role or company, even if a posting exists; role_info must then hold the new job's values.
- "conversation": any field is still missing and no posting exists yet.

CONVERSATION REPLY (only for "conversation"):
Write answer_message, a friendly reply that:
1. Responds naturally to the user's message
2. Acknowledges the values already collected
3. Asks for every field that is "Not yet collected"
4. Stays warm, professional and concise
5. Introduces the assistant and explains it creates job postings when the user has not mentioned job creation yet

feedback is null unless the intent is "refinement". answer_message is null unless the intent is "conversation".`;

export interface RouterPromptOptions {
  formattedHistory: string;
  signal?: AbortSignal;
}

export function buildRouterPrompt(
  state: ConversationState,
  options: RouterPromptOptions
): LLMRequest {
  const hasPosting = state.jobPosting !== null;

  const lines = [
    `## ALREADY COLLECTED VALUES`,
    formatCollectedSlots(state.roleInfo),
    ``,
    `## EXISTING JOB POSTING`,
    hasPosting ? "Yes - a posting has already been generated" : "No posting yet",
    ``,
    `## Current User Message`,
    state.userMessage,
    ``,
    `## Conversation History`,
    options.formattedHistory,
  ];

  return {
    systemPrompt: ROUTER_SYSTEM_PROMPT,
    userMessage: lines.join("\n"),
    maxTokens: 1024,
    temperature: 0,
    outputSchema: {
      name: "route_intent",
      description: "Classify the user's intent and extract job posting slots",
      schema: CLASSIFICATION_JSON_SCHEMA,
    },
    signal: options.signal,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Posting research + writing
// ═══════════════════════════════════════════════════════════════════════════════

const MARKET_RESEARCH_SYSTEM_PROMPT = `You are a job market researcher. Summarize what the market currently expects from the given role at the given location: typical responsibilities, required and preferred qualifications, seniority signals, compensation norms and what makes the company attractive to candidates.

Return concise markdown notes. Do not write the job posting itself.`;

const AI_SKILLS_RESEARCH_SYSTEM_PROMPT = `You are an AI skills researcher. Identify the AI tools, assistants and AI-related skills that professionals in the given role use today, and how they apply to the role's daily work.

Return concise markdown notes listing each tool with one line on how it is used. Do not write the job posting itself.`;

const POSTING_WRITER_SYSTEM_PROMPT = `You are an expert HR job posting writer. Using the research notes provided, write a complete, compelling job posting in markdown.

The posting must contain these sections:
- Role Summary
- Responsibilities
- Requirements
- Suggested AI Tools

Return ONLY the markdown posting.`;

function describeJob(roleInfo: CompleteRoleInfo): string {
  return [
    `Job Role: ${roleInfo.jobRole}`,
    `Location: ${roleInfo.location}`,
    `Company: ${roleInfo.companyName}`,
  ].join("\n");
}

export function buildMarketResearchPrompt(roleInfo: CompleteRoleInfo, signal?: AbortSignal): LLMRequest {
  return {
    systemPrompt: MARKET_RESEARCH_SYSTEM_PROMPT,
    userMessage: describeJob(roleInfo),
    maxTokens: 2048,
    temperature: 0.2,
    signal,
  };
}

export function buildAiSkillsResearchPrompt(roleInfo: CompleteRoleInfo, signal?: AbortSignal): LLMRequest {
  return {
    systemPrompt: AI_SKILLS_RESEARCH_SYSTEM_PROMPT,
    userMessage: describeJob(roleInfo),
    maxTokens: 2048,
    temperature: 0.2,
    signal,
  };
}

export function buildPostingWriterPrompt(
  roleInfo: CompleteRoleInfo,
  marketResearch: string,
  aiSkillsResearch: string,
  signal?: AbortSignal
): LLMRequest {
  const lines = [
    describeJob(roleInfo),
    ``,
    `## Job Market Research`,
    marketResearch,
    ``,
    `## AI Skills Research`,
    aiSkillsResearch,
  ];

  return {
    systemPrompt: POSTING_WRITER_SYSTEM_PROMPT,
    userMessage: lines.join("\n"),
    maxTokens: 4096,
    temperature: 0.3,
    signal,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Refinement
// ═══════════════════════════════════════════════════════════════════════════════

const EDITOR_SYSTEM_PROMPT = `You are a senior job posting editor. You make precise, targeted changes to job postings based on feedback while preserving the overall quality and structure of the posting.

The feedback may ask for the removal or modification of sections, extra detail on certain sections, or a change of tone.

Instructions:
- Make ONLY the changes requested in the feedback
- Preserve the overall structure and quality of the posting
- Keep every section that the feedback does not affect
- Return the complete updated job posting in markdown, and nothing else`;

export function buildRefinementPrompt(request: RefinementRequest, signal?: AbortSignal): LLMRequest {
  const lines = [
    `## CURRENT JOB POSTING`,
    request.jobPosting,
    ``,
    `## USER FEEDBACK TO IMPLEMENT`,
    request.feedback,
  ];

  return {
    systemPrompt: EDITOR_SYSTEM_PROMPT,
    userMessage: lines.join("\n"),
    maxTokens: 4096,
    temperature: 0,
    signal,
  };
}
