import { InvalidToolError, ToolFailureError } from './errors';
import type { FailureKind, PlanState, Tool, ToolArgs, ToolCandidate, ToolFailure, ToolOutcome } from './types';

const TRANSIENT_KINDS: ReadonlySet<FailureKind> = new Set(['timeout', 'rate_limit', 'unavailable']);

const DEFAULT_ARGS: ReadonlyArray<ToolArgs> = [{}];

export function succeed(...candidates: ToolCandidate[]): ToolOutcome {
  return { status: 'ok', candidates };
}

export function fail(kind: FailureKind, message: string, transient?: boolean): ToolOutcome {
  const failure: ToolFailure = transient === undefined ? { kind, message } : { kind, message, transient };
  return { status: 'failed', failure };
}

export function isTransientFailure(failure: ToolFailure): boolean {
  return failure.transient ?? TRANSIENT_KINDS.has(failure.kind);
}

export function failureFromError(error: unknown): ToolFailure {
  if (error instanceof ToolFailureError) {
    return error.options.transient === undefined
      ? { kind: error.kind, message: error.message }
      : { kind: error.kind, message: error.message, transient: error.options.transient };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'error', message };
}

export function toolStepCost(tool: Tool): number {
  return tool.stepCost ?? 1;
}

export function toolArgsFor(tool: Tool, state: PlanState): ReadonlyArray<ToolArgs> {
  return tool.proposeArgs ? tool.proposeArgs(state) : DEFAULT_ARGS;
}

export function assertValidTools(tools: ReadonlyArray<Tool>): void {
  const names = new Set<string>();
  for (const tool of tools) {
    if (tool.name.trim() === '') {
      throw new InvalidToolError(tool.name, 'name must not be empty');
    }
    if (names.has(tool.name)) {
      throw new InvalidToolError(tool.name, 'name is registered twice');
    }
    names.add(tool.name);
    const cost = toolStepCost(tool);
    if (!Number.isFinite(cost) || cost < 0) {
      throw new InvalidToolError(tool.name, `step cost must be a non-negative number, got ${cost}`);
    }
  }
}
