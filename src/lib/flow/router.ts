import type { ClassificationResult, ConversationState, RouteResult } from "./types";
import { cloneState } from "./types";
import { isDifferentJob, isRoleInfoComplete, mergeRoleInfo, missingSlots, slotLabel } from "./role-info";
import { SlotContractViolation } from "./errors";

/**
 * Resolves a classification against the current state. Returns the branch to
 * dispatch and the state that branch runs on; the input state is never
 * mutated, so a failed dispatch leaves nothing behind.
 *
 * Throws SlotContractViolation when the classifier picked an intent whose
 * preconditions the state does not meet.
 */
export function route(state: ConversationState, classification: ClassificationResult): RouteResult {
  switch (classification.userIntent) {
    case "conversation": {
      const answerMessage = classification.answerMessage;
      if (answerMessage === null) {
        throw new SlotContractViolation("Conversation intent returned without an answer message");
      }
      const next = cloneState(state);
      next.roleInfo = mergeRoleInfo(state.roleInfo, classification.roleInfo, false);
      next.answerMessage = answerMessage;
      return { decision: { kind: "conversation", answerMessage }, state: next };
    }

    case "job_creation": {
      // A new job only replaces the old one once a posting exists for it
      const reset = state.jobPosting !== null && isDifferentJob(state.roleInfo, classification.roleInfo);
      const roleInfo = mergeRoleInfo(state.roleInfo, classification.roleInfo, reset);

      if (!isRoleInfoComplete(roleInfo)) {
        const missing = missingSlots(roleInfo).map(slotLabel).join(", ");
        throw new SlotContractViolation(`Job creation intent returned with missing slots: ${missing}`);
      }

      const next = cloneState(state);
      next.roleInfo = { ...roleInfo };
      if (reset) {
        next.jobPosting = null;
        next.feedback = null;
        next.answerMessage = null;
      }
      return {
        decision: {
          kind: "job_creation",
          roleInfo: { jobRole: roleInfo.jobRole, location: roleInfo.location, companyName: roleInfo.companyName },
          reset,
        },
        state: next,
      };
    }

    case "refinement": {
      const jobPosting = state.jobPosting;
      if (jobPosting === null) {
        throw new SlotContractViolation("Refinement intent returned but no job posting exists");
      }
      const feedback = classification.feedback;
      if (feedback === null) {
        throw new SlotContractViolation("Refinement intent returned without feedback");
      }
      const next = cloneState(state);
      next.roleInfo = mergeRoleInfo(state.roleInfo, classification.roleInfo, false);
      next.feedback = feedback;
      return { decision: { kind: "refinement", jobPosting, feedback }, state: next };
    }

    default: {
      const unreachable: never = classification.userIntent;
      throw new SlotContractViolation(`Unknown intent: ${String(unreachable)}`);
    }
  }
}
