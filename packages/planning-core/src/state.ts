import { constraintPenalty, evaluateConstraints } from './goal';
import type {
  ConstraintStatus,
  Goal,
  PlanState,
  Provenance,
  SlotValue,
  Slots,
  StateSnapshot,
  ToolCallRef,
} from './types';

function sortedEntries<T>(record: Readonly<Record<string, T>>): Array<[string, T]> {
  return Object.keys(record)
    .sort()
    .map((key): [string, T] => [key, record[key]]);
}

/**
 * Canonical identity of a state: slot assignments plus constraint flags.
 * Cost, provenance and path history are not part of it.
 */
export function canonicalKey(slots: Slots, constraints: Readonly<Record<string, ConstraintStatus>>): string {
  return JSON.stringify([sortedEntries(slots), sortedEntries(constraints)]);
}

function freezeState(state: PlanState): PlanState {
  Object.freeze(state.slots);
  Object.freeze(state.constraints);
  Object.freeze(state.provenance);
  return Object.freeze(state);
}

export function createInitialState(slots: Slots, goal: Goal): PlanState {
  const normalized: Record<string, SlotValue | null> = {};
  for (const slot of goal.requiredSlots) {
    normalized[slot] = null;
  }
  for (const [slot, value] of Object.entries(slots)) {
    normalized[slot] = value ?? null;
  }
  const constraints = evaluateConstraints(goal, normalized);

  return freezeState({
    key: canonicalKey(normalized, constraints),
    slots: normalized,
    constraints,
    provenance: {},
    g: 0,
    depth: 0,
    parent: null,
    via: null,
  });
}

/**
 * Builds the child reached from `parent` by assigning `assign`.
 * `stepCost` must already include any candidate-specific extra cost; newly
 * violated soft constraints add their penalty on top.
 */
export function deriveState(
  parent: PlanState,
  goal: Goal,
  assign: Readonly<Record<string, SlotValue>>,
  via: ToolCallRef,
  stepCost: number,
): PlanState {
  const slots: Record<string, SlotValue | null> = { ...parent.slots, ...assign };
  const constraints = evaluateConstraints(goal, slots);

  let penalty = 0;
  for (const constraint of goal.constraints) {
    if (constraints[constraint.id] === 'violated' && parent.constraints[constraint.id] !== 'violated') {
      penalty += constraintPenalty(constraint);
    }
  }

  const provenance: Record<string, Provenance> = { ...parent.provenance };
  for (const [slot, value] of Object.entries(assign)) {
    if (parent.slots[slot] !== value) {
      provenance[slot] = { tool: via.tool, args: via.args, ordinal: via.ordinal };
    }
  }

  return freezeState({
    key: canonicalKey(slots, constraints),
    slots,
    constraints,
    provenance,
    g: parent.g + stepCost + penalty,
    depth: parent.depth + 1,
    parent,
    via,
  });
}

/** Slots that `assign` would change from one assigned value to another. */
export function conflictingSlots(state: PlanState, assign: Readonly<Record<string, SlotValue>>): string[] {
  return Object.entries(assign)
    .filter(([slot, value]) => {
      const current = state.slots[slot];
      return current !== null && current !== undefined && current !== value;
    })
    .map(([slot]) => slot);
}

/** States from the root to `state`, inclusive. */
export function pathTo(state: PlanState): PlanState[] {
  const path: PlanState[] = [];
  let cursor: PlanState | null = state;
  while (cursor) {
    path.push(cursor);
    cursor = cursor.parent;
  }
  return path.reverse();
}

export function snapshotState(state: PlanState): StateSnapshot {
  return {
    key: state.key,
    slots: { ...state.slots },
    constraints: { ...state.constraints },
    g: state.g,
    depth: state.depth,
  };
}
