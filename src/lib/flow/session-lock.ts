/**
 * In-process single-writer queue per session id. Turns for the same session
 * run one after another; different sessions never wait on each other.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}
