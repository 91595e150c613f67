import assert from 'node:assert/strict';
import test from 'node:test';
import { FailurePolicy } from './failurePolicy';

test('transient failures are retried up to maxRetries, then pruned', () => {
  const policy = new FailurePolicy(2);
  const failure = { kind: 'timeout' as const, message: 'slow' };

  assert.deepEqual(policy.decide(failure, 1), { disposition: 'retry', transient: true, retriesExhausted: false });
  assert.deepEqual(policy.decide(failure, 2), { disposition: 'retry', transient: true, retriesExhausted: false });
  assert.deepEqual(policy.decide(failure, 3), { disposition: 'prune', transient: true, retriesExhausted: true });
});

test('permanent failures are pruned without retry', () => {
  const policy = new FailurePolicy(5);

  for (const kind of ['precondition', 'contradiction', 'empty_result', 'error', 'cancelled'] as const) {
    assert.deepEqual(policy.decide({ kind, message: kind }, 1), {
      disposition: 'prune',
      transient: false,
      retriesExhausted: false,
    });
  }
});

test('an explicit transient flag overrides the kind', () => {
  const policy = new FailurePolicy(1);

  assert.equal(policy.decide({ kind: 'error', message: 'retry me', transient: true }, 1).disposition, 'retry');
  assert.equal(policy.decide({ kind: 'rate_limit', message: 'give up', transient: false }, 1).disposition, 'prune');
});

test('zero retries prunes the first transient failure', () => {
  assert.deepEqual(new FailurePolicy(0).decide({ kind: 'unavailable', message: 'down' }, 1), {
    disposition: 'prune',
    transient: true,
    retriesExhausted: true,
  });
});
