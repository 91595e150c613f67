import { randomUUID } from 'node:crypto';
import {
  createInitialState,
  replayPlan,
  resolveSearchConfig,
  SearchEngine,
  snapshotState,
  type Degradation,
  type ExecutionTrace,
  type HeuristicMode,
  type HintSource,
  type ReplayResult,
  type ReplayStep,
  type SearchConfig,
  type SearchResult,
  type StateSnapshot,
  type ToolArgs,
} from '@waypoint/planning-core';
import {
  buildTravelGoal,
  createTravelTools,
  initialTravelSlots,
  ReferencePlanHint,
  type TravelCatalog,
  type TravelRequest,
  type TravelToolOptions,
} from '@waypoint/travel-tools';
import { NoopChatModelAdapter, type ChatModelAdapter } from './adapters/llm';
import { computeRunMetrics, evaluateHintGain, type HintGainReport, type RunMetrics } from './evaluation/metrics';
import { LlmHintSource } from './hints/llmHint';
import type { Logger } from './logging';
import type { EvaluateRequest, HintChoice, PlanRequest } from './schemas';

export interface PlannerRuntimeOptions {
  catalog: TravelCatalog;
  searchConfig?: SearchConfig;
  defaultHint?: HintChoice;
  llm?: ChatModelAdapter;
}

export interface PlanStepView {
  step: number;
  ordinal: number;
  tool: string;
  args: ToolArgs;
  attempt: number;
}

export interface PlanResponse {
  requestId: string;
  status: SearchResult['status'];
  goalReached: boolean;
  hint: { requested: HintChoice; mode: HeuristicMode; degraded: Degradation | null };
  plan: PlanStepView[];
  finalState: StateSnapshot | null;
  metrics: RunMetrics;
  trace: ExecutionTrace;
}

export type ExecutionEvent =
  | { event: 'planner'; data: { requestId: string; status: SearchResult['status']; steps: PlanStepView[] } }
  | {
      event: 'step';
      data: {
        index: number;
        total: number;
        tool: string;
        args: ToolArgs;
        preconditionOk: boolean;
        error: string | null;
        diff: ReplayStep['diff'];
        state: ReplayStep['stateAfter'];
        progress: number;
      };
    }
  | {
      event: 'done';
      data: {
        requestId: string;
        total: number;
        status: SearchResult['status'];
        goalReached: boolean;
        finalState: StateSnapshot['slots'];
        metrics: RunMetrics;
      };
    };

interface RunOptions {
  travel: TravelRequest;
  hint: HintChoice;
  search: Partial<SearchConfig>;
  tools?: TravelToolOptions;
  signal?: AbortSignal;
}

function planView(result: SearchResult): PlanStepView[] {
  return result.plan.map((record, index) => ({
    step: index + 1,
    ordinal: record.ordinal,
    tool: record.tool,
    args: record.args,
    attempt: record.attempt,
  }));
}

function describeRequest(travel: TravelRequest): string {
  return `${travel.origin} -> ${travel.region ?? 'anywhere'}`;
}

export class PlannerRuntime {
  private readonly baseConfig: SearchConfig;
  private readonly defaultHint: HintChoice;
  private readonly llm: ChatModelAdapter;

  constructor(private readonly logger: Logger, private readonly options: PlannerRuntimeOptions) {
    this.baseConfig = options.searchConfig ?? resolveSearchConfig();
    this.defaultHint = options.defaultHint ?? 'none';
    this.llm = options.llm ?? new NoopChatModelAdapter();
  }

  async plan(request: PlanRequest, signal?: AbortSignal): Promise<PlanResponse> {
    const requestId = randomUUID();
    const hint = request.hint ?? this.defaultHint;
    const result = await this.search(requestId, {
      travel: request.travel,
      hint,
      search: request.search,
      tools: request.tools,
      signal,
    });

    return {
      requestId,
      status: result.status,
      goalReached: result.goalReached,
      hint: { requested: hint, mode: hint === 'none' ? 'no_hint' : 'with_hint', degraded: result.trace.degraded },
      plan: planView(result),
      finalState: result.finalState ? snapshotState(result.finalState) : null,
      metrics: computeRunMetrics(result, null),
      trace: result.trace,
    };
  }

  /** Plans, then replays the plan step by step, emitting `planner`, `step` and `done` events. */
  async execute(
    request: PlanRequest,
    emit: (event: ExecutionEvent) => void | Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    const requestId = randomUUID();
    const run: RunOptions = {
      travel: request.travel,
      hint: request.hint ?? this.defaultHint,
      search: request.search,
      tools: request.tools,
      signal,
    };
    const result = await this.search(requestId, run);
    const steps = planView(result);
    await emit({ event: 'planner', data: { requestId, status: result.status, steps } });

    const total = steps.length;
    const replay = await this.replay(result, run, async (step) => {
      await emit({
        event: 'step',
        data: {
          index: step.index,
          total,
          tool: step.tool,
          args: step.args,
          preconditionOk: step.preconditionOk,
          error: step.error,
          diff: step.diff,
          state: step.stateAfter,
          progress: Math.round((step.index / total) * 10_000) / 10_000,
        },
      });
    });

    await emit({
      event: 'done',
      data: {
        requestId,
        total,
        status: result.status,
        goalReached: replay.goalReached,
        finalState: { ...replay.finalState.slots },
        metrics: computeRunMetrics(result, replay),
      },
    });
  }

  /** Runs every request without and with the hint, and reports the metric deltas. */
  async evaluate(request: EvaluateRequest, signal?: AbortSignal): Promise<HintGainReport> {
    const evaluationId = randomUUID();
    const pairs: Array<{ label: string; baseline: RunMetrics; hinted: RunMetrics }> = [];

    for (const [index, travel] of request.requests.entries()) {
      const measure = async (hint: HintChoice): Promise<RunMetrics> => {
        const run: RunOptions = { travel, hint, search: request.search, signal };
        const result = await this.search(`${evaluationId}:${index + 1}:${hint}`, run);
        return computeRunMetrics(result, await this.replay(result, run));
      };
      pairs.push({ label: describeRequest(travel), baseline: await measure('none'), hinted: await measure(request.hint) });
    }

    const report = evaluateHintGain(pairs);
    this.logger.info('planner.evaluate.finish', { evaluationId, runs: pairs.length, meanDelta: report.meanDelta });
    return report;
  }

  private hintSourceFor(hint: HintChoice): HintSource | undefined {
    switch (hint) {
      case 'none':
        return undefined;
      case 'reference':
        return new ReferencePlanHint();
      case 'llm':
        return new LlmHintSource(this.llm);
    }
  }

  private async search(requestId: string, run: RunOptions): Promise<SearchResult> {
    const reqLogger = this.logger.child({ requestId });
    const config = resolveSearchConfig({
      ...this.baseConfig,
      ...run.search,
      mode: run.hint === 'none' ? 'no_hint' : 'with_hint',
    });

    reqLogger.info('planner.plan.start', { travel: run.travel, hint: run.hint });
    const engine = new SearchEngine({
      tools: createTravelTools(this.options.catalog, run.travel, run.tools),
      goal: buildTravelGoal(run.travel),
      config,
      hintSource: this.hintSourceFor(run.hint),
      logger: reqLogger,
    });
    const result = await engine.search(initialTravelSlots(), { signal: run.signal });

    reqLogger.info('planner.plan.finish', {
      status: result.status,
      steps: result.plan.map((record) => record.tool),
      degraded: result.trace.degraded,
    });
    return result;
  }

  private replay(
    result: SearchResult,
    run: RunOptions,
    onStep?: (step: ReplayStep) => Promise<void>,
  ): Promise<ReplayResult> {
    const goal = buildTravelGoal(run.travel);
    return replayPlan(createInitialState(initialTravelSlots(), goal), result.plan, {
      tools: createTravelTools(this.options.catalog, run.travel, {
        maxDestinationCandidates: run.tools?.maxDestinationCandidates,
      }),
      goal,
      perCallTimeoutMs: this.baseConfig.perCallTimeoutMs,
      signal: run.signal,
      finalStateKey: result.finalState?.key,
      onStep,
    });
  }
}
