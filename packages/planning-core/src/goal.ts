import type { Constraint, ConstraintStatus, Goal, PlanState, SlotValue, Slots } from './types';

function testConstraint(constraint: Constraint, value: SlotValue, slots: Slots): boolean {
  if ('equals' in constraint) {
    return value === constraint.equals;
  }
  if ('oneOf' in constraint) {
    return constraint.oneOf.includes(value);
  }
  return constraint.test(value, slots);
}

export function evaluateConstraint(constraint: Constraint, slots: Slots): ConstraintStatus {
  const value = slots[constraint.slot];
  if (value === null || value === undefined) {
    return 'pending';
  }
  return testConstraint(constraint, value, slots) ? 'satisfied' : 'violated';
}

export function evaluateConstraints(goal: Goal, slots: Slots): Record<string, ConstraintStatus> {
  const statuses: Record<string, ConstraintStatus> = {};
  for (const constraint of goal.constraints) {
    statuses[constraint.id] = evaluateConstraint(constraint, slots);
  }
  return statuses;
}

export function constraintPenalty(constraint: Constraint): number {
  return constraint.severity === 'soft' ? constraint.penalty ?? 1 : 0;
}

export function isAssigned(slots: Slots, slot: string): boolean {
  const value = slots[slot];
  return value !== null && value !== undefined;
}

export function unassignedRequiredSlots(state: PlanState, goal: Goal): string[] {
  return goal.requiredSlots.filter((slot) => !isAssigned(state.slots, slot));
}

export function violatedConstraints(state: PlanState, goal: Goal, severity: Constraint['severity']): Constraint[] {
  return goal.constraints.filter(
    (constraint) => constraint.severity === severity && state.constraints[constraint.id] === 'violated',
  );
}

export function isGoalState(state: PlanState, goal: Goal): boolean {
  if (unassignedRequiredSlots(state, goal).length > 0) {
    return false;
  }
  return goal.constraints
    .filter((constraint) => constraint.severity === 'hard')
    .every((constraint) => state.constraints[constraint.id] === 'satisfied');
}

/** Throws on duplicate constraint ids and on negative or non-finite penalties. */
export function assertValidGoal(goal: Goal): void {
  const seen = new Set<string>();
  for (const constraint of goal.constraints) {
    if (seen.has(constraint.id)) {
      throw new Error(`Duplicate constraint id: ${constraint.id}`);
    }
    seen.add(constraint.id);
    const penalty = constraint.penalty ?? 1;
    if (!Number.isFinite(penalty) || penalty < 0) {
      throw new Error(`Constraint ${constraint.id} has an invalid penalty: ${penalty}`);
    }
  }
}
