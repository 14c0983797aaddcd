/**
 * Invocation deadline.
 *
 * Remote calls are raced against the time left on the invocation. An
 * expired deadline is a ProvisioningError; whatever the platform already
 * created is left in place for the next run to reuse.
 */

import { ProvisioningError, deadlineExceededError } from '../domain/errors';

export class Deadline {
  private readonly expiresAt?: number;

  constructor(
    private readonly budgetMs?: number,
    private readonly now: () => number = Date.now,
  ) {
    this.expiresAt = budgetMs !== undefined ? now() + budgetMs : undefined;
  }

  /** Milliseconds left, or undefined when the invocation is unbounded. */
  remainingMs(): number | undefined {
    return this.expiresAt === undefined ? undefined : this.expiresAt - this.now();
  }

  /** Throw if the deadline has already passed. */
  check(stage?: string): void {
    const remaining = this.remainingMs();
    if (remaining !== undefined && remaining <= 0) {
      throw new ProvisioningError(deadlineExceededError(this.budgetMs ?? 0, stage));
    }
  }

  /** Settle with `work`, or reject once the deadline passes, whichever is first. */
  async race<T>(work: () => Promise<T>, stage?: string): Promise<T> {
    this.check(stage);
    const remaining = this.remainingMs();
    if (remaining === undefined) {
      return work();
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ProvisioningError(deadlineExceededError(this.budgetMs ?? 0, stage))),
        remaining,
      );
    });
    try {
      return await Promise.race([work(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
