import { DomainError } from '../errors/domain-error.js';

/**
 * Rejects a mutating call that starts while another one on the same
 * component is still running, e.g. from a payout recipient's receive hook.
 */
export class ReentrancyGuard {
  private activeOperation: string | null = null;

  constructor(private readonly component: string) {}

  enter(operation: string): void {
    if (this.activeOperation !== null) {
      throw new DomainError(
        'ReentrantCall',
        `${this.component}.${operation} called while ${this.activeOperation} is in flight`,
        { component: this.component, operation, activeOperation: this.activeOperation }
      );
    }
    this.activeOperation = operation;
  }

  exit(): void {
    this.activeOperation = null;
  }

  isLocked(): boolean {
    return this.activeOperation !== null;
  }
}
