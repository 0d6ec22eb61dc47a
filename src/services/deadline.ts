// Soft wall-clock deadline. Expiry is a signal to drop low-priority work, never an error.

export interface DeadlineLike {
  expired(): boolean;
}

export type Clock = () => number;

export class Deadline implements DeadlineLike {
  private readonly startedAt: number;

  constructor(
    private readonly budgetMs: number | null,
    private readonly now: Clock = Date.now
  ) {
    this.startedAt = now();
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  expired(): boolean {
    if (this.budgetMs === null) return false;
    return this.now() - this.startedAt >= this.budgetMs;
  }
}

export const NO_DEADLINE: DeadlineLike = { expired: () => false };
