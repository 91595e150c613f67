import { isTransientFailure } from './tools';
import type { FailureDisposition, ToolFailure } from './types';

export interface FailureDecision {
  disposition: FailureDisposition;
  transient: boolean;
  retriesExhausted: boolean;
}

/**
 * Retry-or-prune policy for a single branch. Transient failures are retried
 * with the same arguments until `maxRetries` retries have been spent, then the
 * branch is pruned like any permanent failure.
 */
export class FailurePolicy {
  constructor(private readonly maxRetries: number) {}

  /** @param failedAttempts number of failed attempts so far, including this one */
  decide(failure: ToolFailure, failedAttempts: number): FailureDecision {
    const transient = isTransientFailure(failure);
    if (!transient) {
      return { disposition: 'prune', transient, retriesExhausted: false };
    }
    if (failedAttempts <= this.maxRetries) {
      return { disposition: 'retry', transient, retriesExhausted: false };
    }
    return { disposition: 'prune', transient, retriesExhausted: true };
  }
}
