import { RestartBudgetExhaustedError } from "../errors.js";

/**
 * Restart Policy — bounded recovery budget for one supervisor run.
 * The budget never refills: once spent, every later request is refused.
 *
 * @module Health
 */
export class RestartPolicy {
  private attempts = 0;

  constructor(readonly maxAttempts: number) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
      throw new RangeError(`maxAttempts must be a non-negative integer, got ${maxAttempts}`);
    }
  }

  mayRestart(): boolean {
    return this.attempts < this.maxAttempts;
  }

  /** Consume one attempt and return its 1-based number. */
  recordAttempt(): number {
    if (!this.mayRestart()) {
      throw new RestartBudgetExhaustedError(this.maxAttempts);
    }
    this.attempts++;
    return this.attempts;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get exhausted(): boolean {
    return !this.mayRestart();
  }
}
