import { isAssigned, type HintSource, type PlanState } from '@waypoint/planning-core';
import type { TravelSlot } from './goal';
import { TRAVEL_TOOL_COSTS, type TravelToolName } from './tools';

const REFERENCE_PLAN: ReadonlyArray<{ tool: TravelToolName; slot: TravelSlot }> = [
  { tool: 'set_origin', slot: 'origin' },
  { tool: 'set_destination', slot: 'destination' },
  { tool: 'select_transport', slot: 'transport' },
  { tool: 'confirm_booking', slot: 'booking' },
];

/** Remaining cost of the reference booking plan: the step cost of every planned tool whose slot is still open. */
export class ReferencePlanHint implements HintSource {
  readonly name = 'reference-plan';

  estimate(state: PlanState): number {
    return REFERENCE_PLAN.reduce(
      (total, step) => (isAssigned(state.slots, step.slot) ? total : total + TRAVEL_TOOL_COSTS[step.tool]),
      0,
    );
  }
}
