#!/usr/bin/env node
import * as path from "path";
import * as readline from "readline";
import { config } from "dotenv";
import { loadConfig } from "../lib/config";
import { createAssistant } from "../lib/assistant";
import { isFlowError } from "../lib/flow/errors";
import logger from "../lib/logger";
import { printBanner, printReply, printState, printTurnError } from "./display";

config({ path: path.resolve(process.cwd(), ".env.local") });

const args = process.argv.slice(2);
const sessionIndex = args.indexOf("--session");
const sessionId = sessionIndex !== -1 ? args[sessionIndex + 1] : `chat-${Date.now()}`;
const resetFirst = args.includes("--reset");

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const flow = createAssistant(appConfig);

  if (!sessionId) {
    console.error("Error: --session requires an id");
    process.exit(1);
  }
  if (resetFirst) await flow.reset(sessionId);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  printBanner(sessionId);

  const existing = await flow.getState(sessionId);
  if (existing.messageHistory.length > 0) {
    console.log(`  Resumed conversation (${existing.messageHistory.length} messages).`);
    printState(existing);
  }

  const askForMessage = (): void => {
    rl.question("You > ", (input) => {
      const trimmed = input.trim();
      if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") {
        console.log("\nSession saved. Bye.");
        rl.close();
        return;
      }

      if (!trimmed) {
        askForMessage();
        return;
      }

      const turn =
        trimmed === "/state"
          ? flow.getState(sessionId).then((state) => printState(state))
          : flow.submitTurn(sessionId, trimmed).then((result) => printReply(result));

      turn
        .catch((err: unknown) => {
          logger.error({ kind: isFlowError(err) ? err.kind : "unknown", err }, "Chat turn failed");
          printTurnError(err);
        })
        .finally(askForMessage);
    });
  };

  askForMessage();
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
