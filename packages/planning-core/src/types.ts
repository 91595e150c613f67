export type SlotValue = string | number | boolean;

/** Slot name → assigned value, or `null` while unassigned. */
export type Slots = Readonly<Record<string, SlotValue | null>>;

export type ToolArgs = Readonly<Record<string, SlotValue>>;

export type ConstraintSeverity = 'hard' | 'soft';
export type ConstraintStatus = 'satisfied' | 'violated' | 'pending';

interface ConstraintBase {
  id: string;
  slot: string;
  severity: ConstraintSeverity;
  /** Cost added when a soft constraint becomes violated. Ignored for hard constraints. */
  penalty?: number;
  description?: string;
}

export type Constraint =
  | (ConstraintBase & { equals: SlotValue })
  | (ConstraintBase & { oneOf: ReadonlyArray<SlotValue> })
  | (ConstraintBase & { test: (value: SlotValue, slots: Slots) => boolean });

export interface Goal {
  requiredSlots: ReadonlyArray<string>;
  constraints: ReadonlyArray<Constraint>;
}

export interface Provenance {
  tool: string;
  args: ToolArgs;
  ordinal: number;
}

export interface ToolCallRef {
  tool: string;
  args: ToolArgs;
  /** Ordinal of the trace record that produced the state. */
  ordinal: number;
  /** Index of the candidate chosen among the call's results. */
  candidate: number;
}

export interface PlanState {
  readonly key: string;
  readonly slots: Slots;
  readonly constraints: Readonly<Record<string, ConstraintStatus>>;
  readonly provenance: Readonly<Record<string, Provenance>>;
  readonly g: number;
  readonly depth: number;
  readonly parent: PlanState | null;
  readonly via: ToolCallRef | null;
}

export type FailureKind =
  | 'timeout'
  | 'rate_limit'
  | 'unavailable'
  | 'precondition'
  | 'contradiction'
  | 'empty_result'
  | 'error'
  | 'cancelled';

export interface ToolFailure {
  kind: FailureKind;
  message: string;
  /** Overrides the kind-based transient/permanent classification. */
  transient?: boolean;
}

export interface ToolCandidate {
  assign: Readonly<Record<string, SlotValue>>;
  /** Added on top of the tool's step cost for this candidate only. */
  extraCost?: number;
  label?: string;
}

export type ToolOutcome =
  | { status: 'ok'; candidates: ReadonlyArray<ToolCandidate> }
  | { status: 'failed'; failure: ToolFailure };

export interface ToolContext {
  signal: AbortSignal;
  attempt: number;
}

export interface Tool {
  readonly name: string;
  readonly description?: string;
  /** Defaults to 1. */
  readonly stepCost?: number;
  preconditions(state: PlanState): boolean;
  /** Argument sets to try from this state. Defaults to a single empty set. */
  proposeArgs?(state: PlanState): ReadonlyArray<ToolArgs>;
  apply(state: PlanState, args: ToolArgs, context: ToolContext): ToolOutcome | Promise<ToolOutcome>;
}

export interface HintSource {
  readonly name: string;
  estimate(state: PlanState, goal: Goal, signal: AbortSignal): number | Promise<number>;
}

export interface CandidateSummary {
  key: string;
  slots: Slots;
  g: number;
  label?: string;
}

export type FailureDisposition = 'retry' | 'prune';

export type ToolCallOutcome =
  | { status: 'ok'; candidates: CandidateSummary[] }
  | {
      status: 'failed';
      failure: ToolFailure;
      transient: boolean;
      disposition: FailureDisposition;
      retriesExhausted: boolean;
    };

export interface ToolCallRecord {
  ordinal: number;
  tool: string;
  args: ToolArgs;
  attempt: number;
  fromStateKey: string;
  costDelta: number;
  outcome: ToolCallOutcome;
}

export interface ExpansionRecord {
  ordinal: number;
  stateKey: string;
  g: number;
  h: number;
  f: number;
}

export type SearchStatus = 'success' | 'exhausted' | 'unreachable' | 'cancelled';

export interface SearchStats {
  expansions: number;
  toolCalls: number;
  failures: number;
  retries: number;
  prunedByFailure: number;
  prunedByConstraint: number;
  duplicates: number;
  generated: number;
}

export interface Degradation {
  hintSource: string | null;
  reason: string;
}

export interface ExecutionTrace {
  status: SearchStatus;
  records: ToolCallRecord[];
  expansions: ExpansionRecord[];
  plan: ToolCallRecord[];
  degraded: Degradation | null;
  stats: SearchStats;
}

export interface StateSnapshot {
  key: string;
  slots: Slots;
  constraints: Readonly<Record<string, ConstraintStatus>>;
  g: number;
  depth: number;
}

export interface SearchResult {
  status: SearchStatus;
  /** `true` only for Success; best-effort paths of Exhausted/Cancelled are non-goal. */
  goalReached: boolean;
  plan: ToolCallRecord[];
  finalState: PlanState | null;
  trace: ExecutionTrace;
}
