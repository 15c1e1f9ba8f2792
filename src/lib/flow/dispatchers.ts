import type {
  CompleteRoleInfo,
  ConversationState,
  PipelineOptions,
  PostingGenerator,
  PostingRefiner,
  RouteDecision,
} from "./types";
import type { MessageLog } from "./message-log";
import { GenerationError, RefinementError, errorMessage } from "./errors";

/**
 * Dispatchers write into the turn's draft state and log only. Nothing they
 * touch is visible outside the turn until the flow commits it.
 */

export function runConversation(draft: ConversationState, log: MessageLog, answerMessage: string): string {
  draft.answerMessage = answerMessage;
  log.append("assistant", answerMessage);
  return answerMessage;
}

export async function runJobCreation(
  draft: ConversationState,
  log: MessageLog,
  roleInfo: CompleteRoleInfo,
  generator: PostingGenerator,
  options: PipelineOptions = {}
): Promise<string> {
  let posting: string;
  try {
    posting = await generator.generate(roleInfo, options);
  } catch (error) {
    throw new GenerationError(`Job posting generation failed: ${errorMessage(error)}`, { cause: error });
  }
  if (!posting.trim()) {
    throw new GenerationError("Job posting generation returned empty content");
  }

  draft.jobPosting = posting;
  log.append("assistant", posting);
  return posting;
}

export async function runRefinement(
  draft: ConversationState,
  log: MessageLog,
  jobPosting: string,
  feedback: string,
  refiner: PostingRefiner,
  options: PipelineOptions = {}
): Promise<string> {
  let revised: string;
  try {
    revised = await refiner.refine({ jobPosting, feedback }, options);
  } catch (error) {
    throw new RefinementError(`Job posting refinement failed: ${errorMessage(error)}`, { cause: error });
  }
  if (!revised.trim()) {
    throw new RefinementError("Job posting refinement returned empty content");
  }

  draft.jobPosting = revised;
  log.append("assistant", revised);
  return revised;
}

export interface DispatchDependencies {
  generator: PostingGenerator;
  refiner: PostingRefiner;
}

/** Runs exactly one pipeline for the routed decision. */
export async function dispatch(
  decision: RouteDecision,
  draft: ConversationState,
  log: MessageLog,
  deps: DispatchDependencies,
  options: PipelineOptions = {}
): Promise<string> {
  switch (decision.kind) {
    case "conversation":
      return runConversation(draft, log, decision.answerMessage);
    case "job_creation":
      return runJobCreation(draft, log, decision.roleInfo, deps.generator, options);
    case "refinement":
      return runRefinement(draft, log, decision.jobPosting, decision.feedback, deps.refiner, options);
  }
}
