import { z } from "zod/v4";

// ─── Messages ─────────────────────────────────────────────────────────────────
export const MessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
});

export type Message = z.infer<typeof MessageSchema>;
export type MessageRole = Message["role"];

// ─── Slots ────────────────────────────────────────────────────────────────────
export const RoleInfoSchema = z.object({
  jobRole: z.string().nullable(),
  location: z.string().nullable(),
  companyName: z.string().nullable(),
});

export type RoleInfo = z.infer<typeof RoleInfoSchema>;

/** RoleInfo with every slot collected; the only shape job creation accepts. */
export interface CompleteRoleInfo {
  jobRole: string;
  location: string;
  companyName: string;
}

export type SlotName = keyof RoleInfo;

// ─── Conversation state (persisted once per turn) ─────────────────────────────
export const ConversationStateSchema = z.object({
  userMessage: z.string(),
  messageHistory: z.array(MessageSchema),
  roleInfo: RoleInfoSchema,
  jobPosting: z.string().nullable(),
  feedback: z.string().nullable(),
  answerMessage: z.string().nullable(),
});

export type ConversationState = z.infer<typeof ConversationStateSchema>;

// ─── Classification ───────────────────────────────────────────────────────────
export const USER_INTENTS = ["job_creation", "conversation", "refinement"] as const;
export type UserIntent = (typeof USER_INTENTS)[number];

// Wire shape returned by the model. Field names follow the output schema below.
export const LLMClassificationOutputSchema = z.object({
  user_intent: z.enum(USER_INTENTS),
  role_info: z
    .union([
      z.object({
        job_role: z.union([z.string(), z.null()]).optional().default(null),
        location: z.union([z.string(), z.null()]).optional().default(null),
        company_name: z.union([z.string(), z.null()]).optional().default(null),
      }),
      z.null(),
    ])
    .optional()
    .default(null),
  feedback: z.union([z.string(), z.null()]).optional().default(null),
  answer_message: z.union([z.string(), z.null()]).optional().default(null),
  reasoning: z.string(),
});

export type LLMClassificationOutput = z.infer<typeof LLMClassificationOutputSchema>;

export interface ClassificationResult {
  userIntent: UserIntent;
  roleInfo: RoleInfo;
  feedback: string | null;
  answerMessage: string | null;
  reasoning: string;
}

// ─── JSON Schema for structured output (Claude tool_use / OpenAI json_schema) ─
export const CLASSIFICATION_JSON_SCHEMA = {
  type: "object" as const,
  properties: {
    user_intent: {
      type: "string",
      enum: [...USER_INTENTS],
      description: "Routing decision for this message",
    },
    role_info: {
      type: "object",
      properties: {
        job_role: { type: ["string", "null"], description: "Job title being created. null if unknown." },
        location: { type: ["string", "null"], description: "Job location. null if unknown." },
        company_name: { type: ["string", "null"], description: "Hiring company. null if unknown." },
      },
      description: "Slots extracted from the message and history, including already collected values",
    },
    feedback: { type: ["string", "null"], description: "Concise summary of requested changes. Only for refinement." },
    answer_message: { type: ["string", "null"], description: "Reply to the user. Only for conversation." },
    reasoning: { type: "string", description: "Brief explanation of the decision" },
  },
  required: ["user_intent", "role_info", "reasoning"],
};

// ─── Router output ────────────────────────────────────────────────────────────
export type RouteDecision =
  | { kind: "conversation"; answerMessage: string }
  | { kind: "job_creation"; roleInfo: CompleteRoleInfo; reset: boolean }
  | { kind: "refinement"; jobPosting: string; feedback: string };

export interface RouteResult {
  decision: RouteDecision;
  state: ConversationState;
}

// ─── Collaborators ────────────────────────────────────────────────────────────
export interface ClassifyOptions {
  /** Number of most recent messages sent as history; all when omitted. */
  historyWindow?: number;
  signal?: AbortSignal;
}

export interface Classifier {
  classify(state: ConversationState, options?: ClassifyOptions): Promise<ClassificationResult>;
}

// ─── External pipelines ───────────────────────────────────────────────────────
export interface PipelineOptions {
  signal?: AbortSignal;
}

export interface PostingGenerator {
  generate(roleInfo: CompleteRoleInfo, options?: PipelineOptions): Promise<string>;
}

export interface RefinementRequest {
  jobPosting: string;
  feedback: string;
}

export interface PostingRefiner {
  refine(request: RefinementRequest, options?: PipelineOptions): Promise<string>;
}

// ─── Turn result ──────────────────────────────────────────────────────────────
export interface TurnResult {
  reply: string;
  intent: UserIntent;
  state: ConversationState;
}

export function createInitialState(): ConversationState {
  return {
    userMessage: "",
    messageHistory: [],
    roleInfo: { jobRole: null, location: null, companyName: null },
    jobPosting: null,
    feedback: null,
    answerMessage: null,
  };
}

export function cloneState(state: ConversationState): ConversationState {
  return {
    ...state,
    messageHistory: state.messageHistory.map((m) => ({ ...m })),
    roleInfo: { ...state.roleInfo },
  };
}
