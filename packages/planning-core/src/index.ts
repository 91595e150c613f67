export type {
  CandidateSummary,
  Constraint,
  ConstraintSeverity,
  ConstraintStatus,
  Degradation,
  ExecutionTrace,
  ExpansionRecord,
  FailureDisposition,
  FailureKind,
  Goal,
  HintSource,
  PlanState,
  Provenance,
  SearchResult,
  SearchStats,
  SearchStatus,
  SlotValue,
  Slots,
  StateSnapshot,
  Tool,
  ToolArgs,
  ToolCallOutcome,
  ToolCallRecord,
  ToolCallRef,
  ToolCandidate,
  ToolContext,
  ToolFailure,
  ToolOutcome,
} from './types';

export {
  heuristicModeSchema,
  loadSearchConfig,
  parseSearchConfigYaml,
  resolveSearchConfig,
  searchConfigSchema,
  type HeuristicMode,
  type SearchConfig,
  type SearchConfigInput,
} from './config';
export {
  HintUnavailableError,
  InvalidToolError,
  SearchConfigIoError,
  SearchConfigSchemaError,
  ToolFailureError,
} from './errors';
export { FailurePolicy, type FailureDecision } from './failurePolicy';
export { Frontier, compareNodes, type SearchNode } from './frontier';
export { evaluateConstraint, evaluateConstraints, isAssigned, isGoalState, unassignedRequiredSlots } from './goal';
export { HeuristicEstimator, blendEstimates, structuralEstimate, type HeuristicOptions } from './heuristic';
export { silentLogger, type PlannerLogger } from './logger';
export { diffSlots, replayPlan, type ReplayOptions, type ReplayResult, type ReplayStep, type SlotChange } from './replay';
export { SearchEngine, planFor, runSearch, type SearchEngineOptions, type SearchRunOptions } from './search';
export { canonicalKey, createInitialState, deriveState, pathTo, snapshotState } from './state';
export { SuccessorGenerator, invokeTool, type ExpandResult, type Expansion } from './successors';
export { fail, isTransientFailure, succeed, toolStepCost } from './tools';
export { TraceRecorder } from './trace';
