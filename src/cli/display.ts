/**
 * Console helpers for the chat CLI.
 */

import type { ConversationState, TurnResult } from "../lib/flow/types";
import { formatCollectedSlots } from "../lib/flow/role-info";
import { isFlowError } from "../lib/flow/errors";

export function printBanner(sessionId: string): void {
  console.log("+==========================================+");
  console.log("|   Job Posting Assistant -- Chat           |");
  console.log("|   /state shows collected details.         |");
  console.log("|   Type 'quit' to exit.                    |");
  console.log("+==========================================+");
  console.log(`  Session: ${sessionId}\n`);
}

export function printReply(result: TurnResult, indent = "  "): void {
  console.log(`\n${indent}[${result.intent}]`);
  result.reply.split("\n").forEach((line) => {
    console.log(`${indent}${line}`);
  });
  console.log();
}

export function printState(state: ConversationState, indent = "  "): void {
  console.log(`\n${indent}--- Collected Details ---`);
  formatCollectedSlots(state.roleInfo)
    .split("\n")
    .forEach((line) => console.log(`${indent}${line}`));
  console.log(`${indent}Posting:   ${state.jobPosting ? `${state.jobPosting.length} chars` : "none"}`);
  if (state.feedback) console.log(`${indent}Feedback:  ${state.feedback}`);
  console.log(`${indent}Messages:  ${state.messageHistory.length}\n`);
}

export function printTurnError(error: unknown, indent = "  "): void {
  const kind = isFlowError(error) ? error.kind : "unknown";
  console.error(`\n${indent}Something went wrong, please try again. (${kind})\n`);
}
