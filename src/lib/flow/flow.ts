import type { Classifier, ConversationState, PostingGenerator, PostingRefiner, TurnResult } from "./types";
import { cloneState, createInitialState } from "./types";
import type { SessionStore } from "./session-store";
import { assertValidSessionId } from "./session-store";
import { SessionLock } from "./session-lock";
import { MessageLog } from "./message-log";
import { route } from "./router";
import { dispatch } from "./dispatchers";
import { TurnAbortedError, TurnTimeoutError, errorMessage, isFlowError } from "./errors";
import defaultLogger, { createSessionLogger, type Logger } from "../logger";

export interface JobPostingFlowConfig {
  classifier: Classifier;
  generator: PostingGenerator;
  refiner: PostingRefiner;
  store: SessionStore;
  lock?: SessionLock;
  logger?: Logger;
  /** 0 disables the per-turn deadline. */
  turnTimeoutMs?: number;
  historyWindow?: number;
  now?: () => Date;
}

export interface SubmitTurnOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Runs one conversation turn at a time per session:
 * load → record user message → classify → route → dispatch → save.
 *
 * Only a fully successful turn is saved. Any failure, timeout or abort
 * leaves the stored session exactly as it was.
 */
export class JobPostingFlow {
  private classifier: Classifier;
  private generator: PostingGenerator;
  private refiner: PostingRefiner;
  private store: SessionStore;
  private lock: SessionLock;
  private logger: Logger;
  private turnTimeoutMs: number;
  private historyWindow?: number;
  private now: () => Date;

  constructor(config: JobPostingFlowConfig) {
    this.classifier = config.classifier;
    this.generator = config.generator;
    this.refiner = config.refiner;
    this.store = config.store;
    this.lock = config.lock ?? new SessionLock();
    this.logger = config.logger ?? defaultLogger;
    this.turnTimeoutMs = config.turnTimeoutMs ?? 0;
    this.historyWindow = config.historyWindow;
    this.now = config.now ?? (() => new Date());
  }

  async submitTurn(sessionId: string, userMessage: string, options: SubmitTurnOptions = {}): Promise<TurnResult> {
    assertValidSessionId(sessionId);
    const log = createSessionLogger(sessionId, undefined, this.logger);

    return this.lock.runExclusive(sessionId, async () => {
      log.debug({ messageLength: userMessage.length }, "Turn started");
      try {
        const result = await this.withDeadline(
          (signal) => this.runTurn(sessionId, userMessage, signal, log),
          options
        );
        await this.store.save(sessionId, result.state);
        log.info({ intent: result.intent, messages: result.state.messageHistory.length }, "Turn committed");
        return result;
      } catch (error) {
        log.error(
          { kind: isFlowError(error) ? error.kind : "unknown", err: errorMessage(error) },
          "Turn failed; session left unchanged"
        );
        throw error;
      }
    });
  }

  async getState(sessionId: string): Promise<ConversationState> {
    assertValidSessionId(sessionId);
    return (await this.store.load(sessionId)) ?? createInitialState();
  }

  async reset(sessionId: string): Promise<void> {
    assertValidSessionId(sessionId);
    await this.lock.runExclusive(sessionId, () => this.store.delete(sessionId));
  }

  private async runTurn(
    sessionId: string,
    userMessage: string,
    signal: AbortSignal,
    log: Logger
  ): Promise<TurnResult> {
    const stored = (await this.store.load(sessionId)) ?? createInitialState();
    const draft = cloneState(stored);

    const history = new MessageLog(draft.messageHistory, this.now);
    history.append("user", userMessage);
    draft.userMessage = userMessage;
    draft.messageHistory = history.getMessages();

    const classification = await this.classifier.classify(draft, {
      historyWindow: this.historyWindow,
      signal,
    });
    log.debug({ intent: classification.userIntent, reasoning: classification.reasoning }, "Message classified");

    const { decision, state: routed } = route(draft, classification);
    if (decision.kind === "job_creation" && decision.reset) {
      log.info({ roleInfo: decision.roleInfo }, "New job requested; previous posting discarded");
    }

    const routedHistory = new MessageLog(routed.messageHistory, this.now);
    const reply = await dispatch(
      decision,
      routed,
      routedHistory,
      { generator: this.generator, refiner: this.refiner },
      { signal }
    );
    routed.messageHistory = routedHistory.getMessages();

    return { reply, intent: classification.userIntent, state: routed };
  }

  /**
   * Settles with the work's outcome, or rejects once the deadline passes or
   * the caller aborts. Late results of abandoned work are discarded.
   */
  private withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, options: SubmitTurnOptions): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.turnTimeoutMs;
    const callerSignal = options.signal;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        callerSignal?.removeEventListener("abort", onAbort);
        finish();
      };

      const onAbort = (): void => {
        controller.abort();
        settle(() => reject(new TurnAbortedError()));
      };

      if (callerSignal?.aborted) {
        onAbort();
        return;
      }
      callerSignal?.addEventListener("abort", onAbort, { once: true });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          controller.abort();
          settle(() => reject(new TurnTimeoutError(timeoutMs)));
        }, timeoutMs);
      }

      work(controller.signal).then(
        (value) => settle(() => resolve(value)),
        (error: unknown) => settle(() => reject(error))
      );
    });
  }
}

/** A flow bound to one session: submit one user message, get one reply. */
export class ConversationSession {
  private flow: JobPostingFlow;
  readonly sessionId: string;

  constructor(flow: JobPostingFlow, sessionId: string) {
    assertValidSessionId(sessionId);
    this.flow = flow;
    this.sessionId = sessionId;
  }

  async submitTurn(userMessage: string, options?: SubmitTurnOptions): Promise<string> {
    const result = await this.flow.submitTurn(this.sessionId, userMessage, options);
    return result.reply;
  }

  getState(): Promise<ConversationState> {
    return this.flow.getState(this.sessionId);
  }

  reset(): Promise<void> {
    return this.flow.reset(this.sessionId);
  }
}
