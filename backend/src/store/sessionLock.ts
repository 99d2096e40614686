import { SessionBusyError } from '../errors.js';
import type { ConcurrencyPolicy } from '../config.js';

/**
 * Per-session gate: at most one in-flight task per session id.
 * `serialize` queues later tasks behind the running one (the default);
 * `reject-if-busy` fails them with SessionBusyError.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(readonly policy: ConcurrencyPolicy = 'serialize') {}

  isBusy(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  async run<T>(sessionId: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId);
    if (previous && this.policy === 'reject-if-busy') {
      throw new SessionBusyError(sessionId);
    }

    const result = (previous ?? Promise.resolve()).then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    }
  }
}
