import type { ReplayResult, SearchResult, SearchStatus } from '@waypoint/planning-core';

export const METRIC_KEYS = [
  'taskSuccess',
  'planLength',
  'planCost',
  'expansions',
  'toolCalls',
  'toolFailureRate',
  'errorRate',
  'preconditionViolationRate',
  'stateChangeRate',
  'wastedCostRatio',
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];
export type MetricValues = Record<MetricKey, number>;

export interface RunMetrics extends MetricValues {
  status: SearchStatus;
  degraded: boolean;
}

export interface HintGainRun {
  label: string;
  baseline: RunMetrics;
  hinted: RunMetrics;
  delta: MetricValues;
}

export interface HintGainReport {
  runs: HintGainRun[];
  meanDelta: MetricValues;
}

function ratio(part: number, total: number): number {
  return total > 0 ? part / total : 0;
}

/**
 * Metrics of one planning run. Search-side figures come from the trace;
 * execution-side rates (errors, precondition violations, state changes,
 * wasted cost) come from replaying the plan, and are 0 when nothing ran.
 */
export function computeRunMetrics(result: SearchResult, replay: ReplayResult | null): RunMetrics {
  const records = result.trace.records;
  const steps = replay?.steps ?? [];
  const failedRecords = records.filter((record) => record.outcome.status === 'failed').length;
  const totalCost = steps.reduce((sum, step) => sum + step.stepCost, 0);
  const wastedCost = steps
    .filter((step) => Object.keys(step.diff).length === 0)
    .reduce((sum, step) => sum + step.stepCost, 0);
  const succeeded = result.status === 'success' && (replay === null || replay.goalReached);

  return {
    status: result.status,
    degraded: result.trace.degraded !== null,
    taskSuccess: succeeded ? 1 : 0,
    planLength: result.plan.length,
    planCost: result.finalState?.g ?? 0,
    expansions: result.trace.stats.expansions,
    toolCalls: result.trace.stats.toolCalls,
    toolFailureRate: ratio(failedRecords, records.length),
    errorRate: ratio(steps.filter((step) => step.error !== null).length, steps.length),
    preconditionViolationRate: ratio(steps.filter((step) => !step.preconditionOk).length, steps.length),
    stateChangeRate: ratio(steps.filter((step) => Object.keys(step.diff).length > 0).length, steps.length),
    wastedCostRatio: ratio(wastedCost, totalCost),
  };
}

function mapMetrics(value: (key: MetricKey) => number): MetricValues {
  return {
    taskSuccess: value('taskSuccess'),
    planLength: value('planLength'),
    planCost: value('planCost'),
    expansions: value('expansions'),
    toolCalls: value('toolCalls'),
    toolFailureRate: value('toolFailureRate'),
    errorRate: value('errorRate'),
    preconditionViolationRate: value('preconditionViolationRate'),
    stateChangeRate: value('stateChangeRate'),
    wastedCostRatio: value('wastedCostRatio'),
  };
}

/** Per-run and mean differences `hinted - baseline` for every metric. */
export function evaluateHintGain(
  pairs: ReadonlyArray<{ label: string; baseline: RunMetrics; hinted: RunMetrics }>,
): HintGainReport {
  const runs = pairs.map((pair) => ({
    ...pair,
    delta: mapMetrics((key) => pair.hinted[key] - pair.baseline[key]),
  }));
  const meanDelta = mapMetrics((key) =>
    runs.length === 0 ? 0 : runs.reduce((sum, run) => sum + run.delta[key], 0) / runs.length,
  );
  return { runs, meanDelta };
}
