import type { FailureDecision, FailurePolicy } from './failurePolicy';
import type { PlannerLogger } from './logger';
import { conflictingSlots, deriveState } from './state';
import { fail, failureFromError, toolArgsFor, toolStepCost } from './tools';
import type { TraceRecorder } from './trace';
import type {
  CandidateSummary,
  Goal,
  PlanState,
  Tool,
  ToolArgs,
  ToolCallRecord,
  ToolCandidate,
  ToolFailure,
  ToolOutcome,
} from './types';

export interface SuccessorGeneratorOptions {
  tools: ReadonlyArray<Tool>;
  goal: Goal;
  policy: FailurePolicy;
  trace: TraceRecorder;
  perCallTimeoutMs: number;
  concurrency: number;
  logger: PlannerLogger;
}

export interface Expansion {
  tool: string;
  args: ToolArgs;
  records: ToolCallRecord[];
  /** Candidate states of the final successful attempt; empty when the call failed. */
  children: PlanState[];
  failure: { failure: ToolFailure; decision: FailureDecision } | null;
}

export interface ExpandResult {
  expansions: Expansion[];
  cancelled: boolean;
}

interface PendingCall {
  tool: Tool;
  args: ToolArgs;
  /** Set when the tool could not even be set up for this state; the call is never made. */
  setupFailure?: ToolFailure;
}

type AttemptLog =
  | { attempt: number; status: 'ok'; candidates: ToolCandidate[] }
  | { attempt: number; status: 'failed'; failure: ToolFailure; decision: FailureDecision };

function isValidExtraCost(extraCost: number | undefined): boolean {
  return extraCost === undefined || (Number.isFinite(extraCost) && extraCost >= 0);
}

async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index]);
    }
  });
  await Promise.all(runners);
  return results;
}

/**
 * Runs one tool attempt under the per-call timeout and the run's cancellation
 * signal. Never rejects: thrown errors, timeouts and cancellation all come back
 * as failed outcomes.
 */
export function invokeTool(
  tool: Tool,
  state: PlanState,
  args: ToolArgs,
  attempt: number,
  signal: AbortSignal,
  timeoutMs: number,
): Promise<ToolOutcome> {
  if (signal.aborted) {
    return Promise.resolve(fail('cancelled', 'search was cancelled before the call started'));
  }

  return new Promise<ToolOutcome>((resolve) => {
    const controller = new AbortController();
    let settled = false;

    const finish = (outcome: ToolOutcome): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    const onAbort = (): void => {
      controller.abort();
      finish(fail('cancelled', 'search was cancelled during the call'));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(fail('timeout', `${tool.name} did not answer within ${timeoutMs}ms`));
    }, timeoutMs);

    signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => tool.apply(state, args, { signal: controller.signal, attempt }))
      .then(finish, (error: unknown) => finish({ status: 'failed', failure: failureFromError(error) }));
  });
}

function setupFailure(tool: Tool, stage: 'preconditions' | 'proposeArgs', error: unknown): ToolFailure {
  const cause = failureFromError(error);
  return { kind: cause.kind, message: `${tool.name} ${stage} threw: ${cause.message}`, transient: false };
}

export class SuccessorGenerator {
  constructor(private readonly options: SuccessorGeneratorOptions) {}

  /**
   * Tool calls applicable in `state`, in registry order then argument order.
   * A tool whose preconditions or argument proposal throws, or which proposes
   * no arguments, yields a single call carrying a permanent setup failure.
   */
  applicableCalls(state: PlanState): PendingCall[] {
    const calls: PendingCall[] = [];
    for (const tool of this.options.tools) {
      let applicable: boolean;
      try {
        applicable = tool.preconditions(state);
      } catch (error) {
        calls.push({ tool, args: {}, setupFailure: setupFailure(tool, 'preconditions', error) });
        continue;
      }
      if (!applicable) {
        continue;
      }

      let proposals: ReadonlyArray<ToolArgs>;
      try {
        proposals = toolArgsFor(tool, state);
      } catch (error) {
        calls.push({ tool, args: {}, setupFailure: setupFailure(tool, 'proposeArgs', error) });
        continue;
      }
      if (proposals.length === 0) {
        calls.push({
          tool,
          args: {},
          setupFailure: { kind: 'empty_result', message: `${tool.name} proposed no arguments`, transient: false },
        });
        continue;
      }
      for (const args of proposals) {
        calls.push({ tool, args });
      }
    }
    return calls;
  }

  async expand(state: PlanState, signal: AbortSignal): Promise<ExpandResult> {
    const calls = this.applicableCalls(state);
    const attemptLogs = await mapWithConcurrency(calls, this.options.concurrency, (call) =>
      this.runWithRetries(state, call, signal),
    );

    // Fan-in: records are appended in call order, never in completion order.
    const expansions = calls.map((call, index) => this.recordCall(state, call, attemptLogs[index]));
    return { expansions, cancelled: signal.aborted };
  }

  private async runWithRetries(state: PlanState, call: PendingCall, signal: AbortSignal): Promise<AttemptLog[]> {
    const logs: AttemptLog[] = [];
    let failedAttempts = 0;

    if (call.setupFailure) {
      const decision = this.options.policy.decide(call.setupFailure, 1);
      this.logFailure(call, 1, call.setupFailure, decision);
      return [{ attempt: 1, status: 'failed', failure: call.setupFailure, decision }];
    }

    for (let attempt = 1; ; attempt += 1) {
      const outcome = this.normalize(
        state,
        call,
        await invokeTool(call.tool, state, call.args, attempt, signal, this.options.perCallTimeoutMs),
      );

      if (outcome.status === 'ok') {
        logs.push({ attempt, status: 'ok', candidates: [...outcome.candidates] });
        return logs;
      }

      failedAttempts += 1;
      const decision = this.options.policy.decide(outcome.failure, failedAttempts);
      logs.push({ attempt, status: 'failed', failure: outcome.failure, decision });
      this.logFailure(call, attempt, outcome.failure, decision);

      if (decision.disposition === 'prune' || signal.aborted) {
        return logs;
      }
    }
  }

  private logFailure(call: PendingCall, attempt: number, failure: ToolFailure, decision: FailureDecision): void {
    this.options.logger.debug('tool.call.failure', {
      tool: call.tool.name,
      args: call.args,
      attempt,
      kind: failure.kind,
      disposition: decision.disposition,
    });
  }

  /** Maps empty and contradicting results onto permanent failures. */
  private normalize(state: PlanState, call: PendingCall, outcome: ToolOutcome): ToolOutcome {
    if (outcome.status === 'failed') {
      return outcome;
    }
    if (outcome.candidates.length === 0) {
      return fail('empty_result', `${call.tool.name} returned no candidates`);
    }
    if (outcome.candidates.some((candidate) => !isValidExtraCost(candidate.extraCost))) {
      return fail('error', `${call.tool.name} returned a candidate with a negative or non-finite extra cost`);
    }

    const consistent = outcome.candidates.filter((candidate) => conflictingSlots(state, candidate.assign).length === 0);
    if (consistent.length === 0) {
      const slots = [...new Set(outcome.candidates.flatMap((candidate) => conflictingSlots(state, candidate.assign)))];
      return fail('contradiction', `${call.tool.name} contradicts assigned slots: ${slots.join(', ')}`);
    }
    return { status: 'ok', candidates: consistent };
  }

  private recordCall(state: PlanState, call: PendingCall, logs: AttemptLog[]): Expansion {
    const { goal, trace } = this.options;
    const stepCost = toolStepCost(call.tool);
    const records: ToolCallRecord[] = [];
    let children: PlanState[] = [];
    let failure: Expansion['failure'] = null;

    for (const log of logs) {
      if (log.status === 'failed') {
        records.push(
          trace.recordToolCall({
            tool: call.tool.name,
            args: call.args,
            attempt: log.attempt,
            fromStateKey: state.key,
            costDelta: stepCost,
            outcome: {
              status: 'failed',
              failure: log.failure,
              transient: log.decision.transient,
              disposition: log.decision.disposition,
              retriesExhausted: log.decision.retriesExhausted,
            },
          }),
        );
        failure = { failure: log.failure, decision: log.decision };
        continue;
      }

      const ordinal = trace.upcomingOrdinal;
      children = log.candidates.map((candidate, index) =>
        deriveState(
          state,
          goal,
          candidate.assign,
          { tool: call.tool.name, args: call.args, ordinal, candidate: index },
          stepCost + (candidate.extraCost ?? 0),
        ),
      );
      const candidates: CandidateSummary[] = children.map((child, index) => {
        const label = log.candidates[index].label;
        const summary: CandidateSummary = { key: child.key, slots: { ...child.slots }, g: child.g };
        return label === undefined ? summary : { ...summary, label };
      });
      records.push(
        trace.recordToolCall({
          tool: call.tool.name,
          args: call.args,
          attempt: log.attempt,
          fromStateKey: state.key,
          costDelta: stepCost,
          outcome: { status: 'ok', candidates },
        }),
      );
      failure = null;
    }

    return { tool: call.tool.name, args: call.args, records, children, failure };
  }
}
