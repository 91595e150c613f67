import type { HeuristicMode } from './config';
import { unassignedRequiredSlots, violatedConstraints } from './goal';
import type { PlannerLogger } from './logger';
import { silentLogger } from './logger';
import type { Degradation, Goal, HintSource, PlanState } from './types';

export interface HeuristicOptions {
  mode: HeuristicMode;
  hintWeight: number;
  slotCost: number;
  constraintCost: number;
  hintSource?: HintSource;
  /** Upper bound on a single hint call; unbounded when omitted. */
  hintTimeoutMs?: number;
  logger?: PlannerLogger;
}

type HintSettlement =
  | { status: 'value'; value: number }
  | { status: 'error'; error: unknown }
  | { status: 'timeout' }
  | { status: 'aborted' };

/** Settles with the hint's answer, its timeout, or the run's abort, whichever comes first. */
function settleHint(
  hintSource: HintSource,
  state: PlanState,
  goal: Goal,
  signal: AbortSignal,
  timeoutMs: number | undefined,
): Promise<HintSettlement> {
  if (signal.aborted) {
    return Promise.resolve({ status: 'aborted' });
  }

  return new Promise<HintSettlement>((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (settlement: HintSettlement): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      resolve(settlement);
    };

    const onAbort = (): void => finish({ status: 'aborted' });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => finish({ status: 'timeout' }), timeoutMs);
    }
    signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => hintSource.estimate(state, goal, signal))
      .then(
        (value) => finish({ status: 'value', value }),
        (error: unknown) => finish(signal.aborted ? { status: 'aborted' } : { status: 'error', error }),
      );
  });
}

/**
 * Structural estimate: unassigned required slots plus violated hard constraints,
 * each weighted by a fixed cost. Never overestimates while every tool costs at
 * least `slotCost` and resolves at most one required slot.
 */
export function structuralEstimate(
  state: PlanState,
  goal: Goal,
  weights: Pick<HeuristicOptions, 'slotCost' | 'constraintCost'>,
): number {
  const slots = unassignedRequiredSlots(state, goal).length;
  const hard = violatedConstraints(state, goal, 'hard').length;
  return weights.slotCost * slots + weights.constraintCost * hard;
}

export function blendEstimates(structural: number, hint: number, hintWeight: number): number {
  return structural * (1 - hintWeight) + hint * hintWeight;
}

/**
 * Per-run estimator. In `with_hint` mode it blends the hint source into the
 * structural estimate; the first hint failure switches the rest of the run to
 * `no_hint` and is reported through {@link HeuristicEstimator.degraded}.
 */
export class HeuristicEstimator {
  private readonly hintCache = new Map<string, number>();
  private degradation: Degradation | null = null;
  private readonly logger: PlannerLogger;

  constructor(private readonly goal: Goal, private readonly options: HeuristicOptions) {
    this.logger = options.logger ?? silentLogger;
    if (options.mode === 'with_hint' && !options.hintSource) {
      this.degrade(null, 'with_hint mode requested but no hint source is configured');
    }
  }

  get degraded(): Degradation | null {
    return this.degradation;
  }

  get activeMode(): HeuristicMode {
    return this.options.mode === 'with_hint' && this.degradation === null ? 'with_hint' : 'no_hint';
  }

  async estimate(state: PlanState, signal: AbortSignal): Promise<number> {
    const structural = structuralEstimate(state, this.goal, this.options);
    const hintSource = this.options.hintSource;
    if (this.activeMode === 'no_hint' || !hintSource) {
      return structural;
    }

    const hint = await this.hintFor(hintSource, state, signal);
    if (hint === null) {
      return structural;
    }
    return blendEstimates(structural, hint, this.options.hintWeight);
  }

  private async hintFor(hintSource: HintSource, state: PlanState, signal: AbortSignal): Promise<number | null> {
    const cached = this.hintCache.get(state.key);
    if (cached !== undefined) {
      return cached;
    }

    const settlement = await settleHint(hintSource, state, this.goal, signal, this.options.hintTimeoutMs);
    if (settlement.status === 'aborted') {
      return null;
    }
    if (settlement.status === 'timeout') {
      this.degrade(hintSource.name, `hint source did not answer within ${this.options.hintTimeoutMs}ms`);
      return null;
    }
    if (settlement.status === 'error') {
      const { error } = settlement;
      this.degrade(hintSource.name, error instanceof Error ? error.message : String(error));
      return null;
    }

    const value = settlement.value;
    if (!Number.isFinite(value) || value < 0) {
      this.degrade(hintSource.name, `hint source returned an invalid estimate: ${value}`);
      return null;
    }

    this.hintCache.set(state.key, value);
    return value;
  }

  private degrade(hintSource: string | null, reason: string): void {
    if (this.degradation) {
      return;
    }
    this.degradation = { hintSource, reason };
    this.logger.warn('heuristic.hint.degraded', { hintSource, reason });
  }
}
