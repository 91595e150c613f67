import { resolveSearchConfig, type SearchConfig, type SearchConfigInput } from './config';
import { FailurePolicy } from './failurePolicy';
import { type SearchNode, Frontier } from './frontier';
import { assertValidGoal, isGoalState, violatedConstraints } from './goal';
import { HeuristicEstimator } from './heuristic';
import { type PlannerLogger, silentLogger } from './logger';
import { createInitialState, pathTo } from './state';
import { SuccessorGenerator } from './successors';
import { assertValidTools } from './tools';
import { TraceRecorder } from './trace';
import type {
  Goal,
  HintSource,
  PlanState,
  SearchResult,
  SearchStats,
  SearchStatus,
  Slots,
  Tool,
  ToolCallRecord,
} from './types';

export interface SearchEngineOptions {
  tools: ReadonlyArray<Tool>;
  goal: Goal;
  config?: SearchConfigInput;
  hintSource?: HintSource;
  logger?: PlannerLogger;
}

export interface SearchRunOptions {
  signal?: AbortSignal;
}

/** Best-effort ranking: lowest f, then lowest h, then earliest insertion. */
function isBetterFallback(candidate: SearchNode, current: SearchNode): boolean {
  if (candidate.f !== current.f) {
    return candidate.f < current.f;
  }
  if (candidate.h !== current.h) {
    return candidate.h < current.h;
  }
  return candidate.seq < current.seq;
}

function emptyStats(): SearchStats {
  return {
    expansions: 0,
    toolCalls: 0,
    failures: 0,
    retries: 0,
    prunedByFailure: 0,
    prunedByConstraint: 0,
    duplicates: 0,
    generated: 0,
  };
}

/**
 * A*-style best-first search over tool calls.
 *
 * Each run owns its frontier, visited map, trace and heuristic state, so one
 * engine can serve many runs. Tool failures and hard-constraint violations only
 * ever remove their own branch; the run ends as success, exhausted (budget),
 * cancelled (signal) or unreachable (empty frontier).
 *
 * @example
 * ```ts
 * const engine = new SearchEngine({ tools, goal, config: { maxExpansions: 200 } });
 * const result = await engine.search({ origin: null });
 * if (result.status === 'success') {
 *   result.plan.forEach((step) => console.log(step.tool, step.args));
 * }
 * ```
 */
export class SearchEngine {
  readonly config: SearchConfig;
  private readonly logger: PlannerLogger;

  constructor(private readonly options: SearchEngineOptions) {
    assertValidTools(options.tools);
    assertValidGoal(options.goal);
    this.config = resolveSearchConfig(options.config);
    this.logger = options.logger ?? silentLogger;
  }

  initialState(slots: Slots): PlanState {
    return createInitialState(slots, this.options.goal);
  }

  async search(initial: PlanState | Slots, runOptions: SearchRunOptions = {}): Promise<SearchResult> {
    const { goal, tools } = this.options;
    const config = this.config;
    const signal = runOptions.signal ?? new AbortController().signal;
    const root = isPlanState(initial) ? initial : this.initialState(initial);
    const deadline = config.deadlineMs === undefined ? null : Date.now() + config.deadlineMs;
    const logger = this.logger.child({ component: 'search' });

    const trace = new TraceRecorder();
    const stats = emptyStats();
    const estimator = new HeuristicEstimator(goal, {
      mode: config.mode,
      hintWeight: config.hintWeight,
      slotCost: config.slotCost,
      constraintCost: config.constraintCost,
      hintSource: this.options.hintSource,
      hintTimeoutMs: config.perCallTimeoutMs,
      logger,
    });
    const generator = new SuccessorGenerator({
      tools,
      goal,
      trace,
      policy: new FailurePolicy(config.maxRetries),
      perCallTimeoutMs: config.perCallTimeoutMs,
      concurrency: config.concurrency,
      logger,
    });

    const frontier = new Frontier();
    const visited = new Map<string, number>();
    const queued = new Map<string, number>();
    let seq = 0;

    const makeNode = async (state: PlanState): Promise<SearchNode> => {
      const h = await estimator.estimate(state, signal);
      const node = { state, g: state.g, h, f: state.g + h, seq };
      seq += 1;
      return node;
    };

    const finish = (status: SearchStatus, node: SearchNode | null): SearchResult => {
      const plan = node ? planFor(node.state, trace) : [];
      stats.toolCalls = trace.toolCallCount;
      const result: SearchResult = {
        status,
        goalReached: status === 'success',
        plan,
        finalState: node ? node.state : null,
        trace: {
          status,
          records: trace.records,
          expansions: trace.expansions,
          plan,
          degraded: estimator.degraded,
          stats: { ...stats },
        },
      };
      logger.info('search.finish', {
        status,
        planLength: plan.length,
        cost: node ? node.g : null,
        mode: estimator.activeMode,
        degraded: estimator.degraded !== null,
        ...stats,
      });
      return result;
    };

    const budgetSpent = (): string | null => {
      if (stats.expansions >= config.maxExpansions) {
        return 'max_expansions';
      }
      if (config.maxToolCalls !== undefined && trace.toolCallCount >= config.maxToolCalls) {
        return 'max_tool_calls';
      }
      if (deadline !== null && Date.now() >= deadline) {
        return 'deadline';
      }
      return null;
    };

    logger.info('search.start', {
      mode: config.mode,
      tools: tools.map((tool) => tool.name),
      maxExpansions: config.maxExpansions,
      root: root.slots,
    });

    const rootNode = await makeNode(root);
    frontier.push(rootNode);
    queued.set(root.key, root.g);
    let best = rootNode;

    for (;;) {
      if (signal.aborted) {
        return finish('cancelled', best);
      }

      const node = frontier.pop();
      if (!node) {
        return finish('unreachable', null);
      }

      if (isGoalState(node.state, goal)) {
        return finish('success', node);
      }

      const seen = visited.get(node.state.key);
      if (seen !== undefined && seen <= node.g) {
        stats.duplicates += 1;
        continue;
      }

      const spent = budgetSpent();
      if (spent) {
        logger.info('search.budget_exceeded', { budget: spent });
        return finish('exhausted', best);
      }

      visited.set(node.state.key, node.g);
      stats.expansions += 1;
      trace.recordExpansion({ stateKey: node.state.key, g: node.g, h: node.h, f: node.f });
      logger.debug('search.expand', { depth: node.state.depth, g: node.g, h: node.h, f: node.f });

      const { expansions, cancelled } = await generator.expand(node.state, signal);
      if (cancelled) {
        return finish('cancelled', best);
      }

      for (const expansion of expansions) {
        for (const record of expansion.records) {
          if (record.outcome.status === 'failed') {
            stats.failures += 1;
            if (record.outcome.disposition === 'retry') {
              stats.retries += 1;
            }
          }
        }
        if (expansion.failure) {
          stats.prunedByFailure += 1;
          continue;
        }

        for (const child of expansion.children) {
          stats.generated += 1;

          const violated = violatedConstraints(child, goal, 'hard');
          if (violated.length > 0) {
            stats.prunedByConstraint += 1;
            logger.debug('search.prune', {
              tool: expansion.tool,
              constraints: violated.map((constraint) => constraint.id),
            });
            continue;
          }

          const visitedG = visited.get(child.key);
          const queuedG = queued.get(child.key);
          if ((visitedG !== undefined && visitedG <= child.g) || (queuedG !== undefined && queuedG <= child.g)) {
            stats.duplicates += 1;
            continue;
          }

          const childNode = await makeNode(child);
          frontier.push(childNode);
          queued.set(child.key, child.g);
          if (isBetterFallback(childNode, best)) {
            best = childNode;
          }
        }
      }
    }
  }
}

function isPlanState(value: PlanState | Slots): value is PlanState {
  return typeof value.key === 'string' && 'constraints' in value && 'provenance' in value && 'g' in value;
}

/** Tool call records along the parent chain of `state`, root first. */
export function planFor(state: PlanState, trace: TraceRecorder): ToolCallRecord[] {
  const plan: ToolCallRecord[] = [];
  for (const step of pathTo(state)) {
    if (!step.via) {
      continue;
    }
    const record = trace.toolCall(step.via.ordinal);
    if (record) {
      plan.push(record);
    }
  }
  return plan;
}

export async function runSearch(
  initial: PlanState | Slots,
  options: SearchEngineOptions & SearchRunOptions,
): Promise<SearchResult> {
  const { signal, ...engineOptions } = options;
  return new SearchEngine(engineOptions).search(initial, { signal });
}
