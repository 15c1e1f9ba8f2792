export type FlowErrorKind =
  | "classification"
  | "slot_contract_violation"
  | "generation"
  | "refinement"
  | "turn_timeout"
  | "turn_aborted"
  | "session_store"
  | "config";

/**
 * Base class for every error a turn can fail with. The `kind` is what the
 * transport logs; the message is for operators, not end users.
 */
export abstract class FlowError extends Error {
  abstract readonly kind: FlowErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The classifier was unreachable or returned a result outside the schema. */
export class ClassificationError extends FlowError {
  readonly kind = "classification";
}

/** The classifier claimed an intent without satisfying its required slots. */
export class SlotContractViolation extends FlowError {
  readonly kind = "slot_contract_violation";
}

export class GenerationError extends FlowError {
  readonly kind = "generation";
}

export class RefinementError extends FlowError {
  readonly kind = "refinement";
}

export class TurnTimeoutError extends FlowError {
  readonly kind = "turn_timeout";

  constructor(timeoutMs: number) {
    super(`Turn exceeded ${timeoutMs}ms`);
  }
}

export class TurnAbortedError extends FlowError {
  readonly kind = "turn_aborted";

  constructor() {
    super("Turn aborted by caller");
  }
}

export class SessionStoreError extends FlowError {
  readonly kind = "session_store";
}

export class ConfigError extends FlowError {
  readonly kind = "config";
}

export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
