import { isGoalState } from './goal';
import { deriveState } from './state';
import { invokeTool } from './successors';
import { failureFromError, toolStepCost } from './tools';
import type { Goal, PlanState, SlotValue, Slots, Tool, ToolArgs, ToolCallRecord } from './types';

export interface SlotChange {
  before: SlotValue | null;
  after: SlotValue | null;
}

export interface ReplayStep {
  index: number;
  tool: string;
  args: ToolArgs;
  preconditionOk: boolean;
  error: string | null;
  /** The live result did not include the candidate chosen during search. */
  deviated: boolean;
  diff: Record<string, SlotChange>;
  stateAfter: Slots;
  stepCost: number;
}

export interface ReplayResult {
  steps: ReplayStep[];
  finalState: PlanState;
  goalReached: boolean;
}

export interface ReplayOptions {
  tools: ReadonlyArray<Tool>;
  goal: Goal;
  perCallTimeoutMs?: number;
  signal?: AbortSignal;
  /** Key of the state the plan ended in; picks the last step's candidate. */
  finalStateKey?: string;
  onStep?: (step: ReplayStep) => void | Promise<void>;
}

export function diffSlots(before: Slots, after: Slots): Record<string, SlotChange> {
  const diff: Record<string, SlotChange> = {};
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  for (const key of keys) {
    const previous = before[key] ?? null;
    const next = after[key] ?? null;
    if (previous !== next) {
      diff[key] = { before: previous, after: next };
    }
  }
  return diff;
}

/**
 * Re-executes a plan step by step from `initial`, re-applying each tool with
 * its recorded arguments. Failed steps are reported and leave the state as it
 * was; the replay carries on with the next step.
 */
export async function replayPlan(
  initial: PlanState,
  plan: ReadonlyArray<ToolCallRecord>,
  options: ReplayOptions,
): Promise<ReplayResult> {
  const toolsByName = new Map(options.tools.map((tool) => [tool.name, tool]));
  const signal = options.signal ?? new AbortController().signal;
  const timeoutMs = options.perCallTimeoutMs ?? 10_000;
  const steps: ReplayStep[] = [];
  let state = initial;

  for (const [index, record] of plan.entries()) {
    const expectedKey = plan[index + 1]?.fromStateKey ?? options.finalStateKey;
    const tool = toolsByName.get(record.tool);
    const base = { index: index + 1, tool: record.tool, args: record.args };

    const preconditionError = tool ? checkPreconditions(tool, state) : null;

    let step: ReplayStep;
    if (!tool) {
      step = failedStep(base, state, false, `Tool not registered: ${record.tool}`, 0);
    } else if (preconditionError !== null) {
      step = failedStep(base, state, false, preconditionError, toolStepCost(tool));
    } else {
      const outcome = await invokeTool(tool, state, record.args, 1, signal, timeoutMs);
      if (outcome.status === 'failed') {
        step = failedStep(base, state, true, outcome.failure.message, toolStepCost(tool));
      } else if (outcome.candidates.length === 0) {
        step = failedStep(base, state, true, `${tool.name} returned no candidates`, toolStepCost(tool));
      } else {
        const via = { tool: tool.name, args: record.args, ordinal: record.ordinal, candidate: 0 };
        const children = outcome.candidates.map((candidate, candidateIndex) =>
          deriveState(
            state,
            options.goal,
            candidate.assign,
            { ...via, candidate: candidateIndex },
            toolStepCost(tool) + (candidate.extraCost ?? 0),
          ),
        );
        const matched = expectedKey === undefined ? children[0] : children.find((child) => child.key === expectedKey);
        const next = matched ?? children[0];
        step = {
          ...base,
          preconditionOk: true,
          error: null,
          deviated: matched === undefined,
          diff: diffSlots(state.slots, next.slots),
          stateAfter: { ...next.slots },
          stepCost: toolStepCost(tool),
        };
        state = next;
      }
    }

    steps.push(step);
    if (options.onStep) {
      await options.onStep(step);
    }
  }

  return { steps, finalState: state, goalReached: isGoalState(state, options.goal) };
}

/** Null when the preconditions hold, otherwise the reason they do not. */
function checkPreconditions(tool: Tool, state: PlanState): string | null {
  try {
    return tool.preconditions(state) ? null : `Precondition failed for ${tool.name}`;
  } catch (error) {
    return `Precondition check for ${tool.name} threw: ${failureFromError(error).message}`;
  }
}

function failedStep(
  base: Pick<ReplayStep, 'index' | 'tool' | 'args'>,
  state: PlanState,
  preconditionOk: boolean,
  error: string,
  stepCost: number,
): ReplayStep {
  return {
    ...base,
    preconditionOk,
    error,
    deviated: false,
    diff: {},
    stateAfter: { ...state.slots },
    stepCost,
  };
}
