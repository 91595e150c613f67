import type { Constraint, Goal, Slots } from '@waypoint/planning-core';
import { sameName, travelRequestSchema, type TravelRequestInput } from './request';

export const TRAVEL_SLOTS = ['origin', 'destination', 'destination_region', 'transport', 'booking'] as const;
export type TravelSlot = (typeof TRAVEL_SLOTS)[number];

export const REQUIRED_TRAVEL_SLOTS: ReadonlyArray<TravelSlot> = ['origin', 'destination', 'transport', 'booking'];

export function initialTravelSlots(): Slots {
  const slots: Record<string, null> = {};
  for (const slot of TRAVEL_SLOTS) {
    slots[slot] = null;
  }
  return slots;
}

/**
 * Structured goal for a travel request: the four booking slots are required,
 * origin, region, exclusions and a fixed transport mode are hard constraints,
 * and a preferred transport mode is a soft one.
 */
export function buildTravelGoal(input: TravelRequestInput): Goal {
  const request = travelRequestSchema.parse(input);
  const constraints: Constraint[] = [
    {
      id: 'origin',
      slot: 'origin',
      severity: 'hard',
      description: `origin is ${request.origin}`,
      test: (value) => typeof value === 'string' && sameName(value, request.origin),
    },
  ];

  const region = request.region;
  if (region) {
    constraints.push({
      id: 'destination-region',
      slot: 'destination_region',
      severity: 'hard',
      description: `destination is in ${region}`,
      test: (value) => typeof value === 'string' && sameName(value, region),
    });
  }

  if (request.excludeDestinations.length > 0) {
    const excluded = request.excludeDestinations;
    constraints.push({
      id: 'destination-not-excluded',
      slot: 'destination',
      severity: 'hard',
      description: `destination is none of ${excluded.join(', ')}`,
      test: (value) => typeof value === 'string' && !excluded.some((name) => sameName(name, value)),
    });
  }

  if (request.transport) {
    constraints.push({
      id: 'transport',
      slot: 'transport',
      severity: 'hard',
      description: `travel by ${request.transport}`,
      equals: request.transport,
    });
  }

  if (request.preferredTransport) {
    constraints.push({
      id: 'preferred-transport',
      slot: 'transport',
      severity: 'soft',
      penalty: 1,
      description: `prefer travelling by ${request.preferredTransport}`,
      equals: request.preferredTransport,
    });
  }

  return { requiredSlots: REQUIRED_TRAVEL_SLOTS, constraints };
}
