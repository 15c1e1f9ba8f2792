// Slot store + message log
export {
  mergeRoleInfo,
  emptyRoleInfo,
  isRoleInfoComplete,
  missingSlots,
  formatCollectedSlots,
  isDifferentJob,
  normalizeSlot,
  SLOT_NAMES,
} from "./role-info";
export { MessageLog, type FormatHistoryOptions } from "./message-log";

// Classification + routing
export { IntentClassifier } from "./intent-classifier";
export { parseClassificationOutput, extractJson } from "./output-parser";
export { buildRouterPrompt, buildRefinementPrompt } from "./prompts";
export { route } from "./router";

// Pipelines
export { dispatch, runConversation, runJobCreation, runRefinement } from "./dispatchers";
export { JobPostingCrew } from "./posting-crew";
export { PostingEditor } from "./posting-editor";

// Turn control + persistence
export { JobPostingFlow, ConversationSession } from "./flow";
export type { JobPostingFlowConfig, SubmitTurnOptions } from "./flow";
export {
  InMemorySessionStore,
  FileSessionStore,
  serializeState,
  deserializeState,
  type SessionStore,
} from "./session-store";
export { SessionLock } from "./session-lock";

export {
  FlowError,
  ClassificationError,
  SlotContractViolation,
  GenerationError,
  RefinementError,
  TurnTimeoutError,
  TurnAbortedError,
  SessionStoreError,
  ConfigError,
  isFlowError,
  type FlowErrorKind,
} from "./errors";

export type {
  Message,
  MessageRole,
  RoleInfo,
  CompleteRoleInfo,
  ConversationState,
  ClassificationResult,
  UserIntent,
  RouteDecision,
  RouteResult,
  Classifier,
  ClassifyOptions,
  PostingGenerator,
  PostingRefiner,
  RefinementRequest,
  TurnResult,
} from "./types";
export { createInitialState, USER_INTENTS } from "./types";
