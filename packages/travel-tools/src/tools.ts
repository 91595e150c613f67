import {
  fail,
  isAssigned,
  succeed,
  type FailureKind,
  type PlanState,
  type Tool,
  type ToolArgs,
  type ToolOutcome,
} from '@waypoint/planning-core';
import type { City, TravelCatalog } from './catalog';
import {
  TRANSPORT_MODES,
  transportModeSchema,
  travelRequestSchema,
  type TransportMode,
  type TravelRequestInput,
} from './request';

export const TRAVEL_TOOL_COSTS = {
  set_origin: 1,
  set_destination: 1,
  select_transport: 1.2,
  confirm_booking: 2,
} as const;

export type TravelToolName = keyof typeof TRAVEL_TOOL_COSTS;

export interface TravelToolOptions {
  /** Upper bound on destinations offered by one `set_destination` call. Defaults to 3. */
  maxDestinationCandidates?: number;
  /** Failure kinds returned, in order, by the first calls of a tool. */
  faults?: Partial<Record<TravelToolName, ReadonlyArray<FailureKind>>>;
}

function stringArg(args: ToolArgs, name: string): string | undefined {
  const value = args[name];
  return typeof value === 'string' ? value : undefined;
}

function slotString(state: PlanState, slot: string): string | undefined {
  const value = state.slots[slot];
  return typeof value === 'string' ? value : undefined;
}

/**
 * The travel tool set for one request, bound to a catalog. Tools are returned
 * in registry order: origin, destination, transport, booking.
 */
export function createTravelTools(
  catalog: TravelCatalog,
  input: TravelRequestInput,
  options: TravelToolOptions = {},
): Tool[] {
  const request = travelRequestSchema.parse(input);
  const maxCandidates = options.maxDestinationCandidates ?? 3;
  if (!Number.isInteger(maxCandidates) || maxCandidates < 1) {
    throw new Error(`maxDestinationCandidates must be a positive integer, got ${maxCandidates}`);
  }

  const faults = new Map<TravelToolName, FailureKind[]>();
  for (const name of Object.keys(TRAVEL_TOOL_COSTS)) {
    if (isTravelToolName(name)) {
      faults.set(name, [...(options.faults?.[name] ?? [])]);
    }
  }
  const injectedFault = (name: TravelToolName): ToolOutcome | null => {
    const kind = faults.get(name)?.shift();
    return kind ? fail(kind, `${name} failed with injected ${kind}`) : null;
  };

  const lookup = (name: string | undefined, role: string): City | ToolOutcome => {
    const city = name === undefined ? undefined : catalog.find(name);
    return city ?? fail('precondition', `Unknown ${role} city '${name ?? '<missing>'}'`);
  };

  const setOrigin: Tool = {
    name: 'set_origin',
    description: 'Set the origin city for travel',
    stepCost: TRAVEL_TOOL_COSTS.set_origin,
    preconditions: (state) => !isAssigned(state.slots, 'origin'),
    proposeArgs: () => [{ city: request.origin }],
    apply: (_state, args) => {
      const fault = injectedFault('set_origin');
      if (fault) {
        return fault;
      }
      const city = lookup(stringArg(args, 'city'), 'origin');
      if ('status' in city) {
        return city;
      }
      return succeed({ assign: { origin: city.name }, label: city.name });
    },
  };

  const setDestination: Tool = {
    name: 'set_destination',
    description: 'Set the destination city',
    stepCost: TRAVEL_TOOL_COSTS.set_destination,
    preconditions: (state) => isAssigned(state.slots, 'origin') && !isAssigned(state.slots, 'destination'),
    proposeArgs: (): ToolArgs[] => [request.region ? { region: request.region } : {}],
    apply: (state, args) => {
      const fault = injectedFault('set_destination');
      if (fault) {
        return fault;
      }
      const origin = slotString(state, 'origin');
      const cities = catalog
        .query({
          region: stringArg(args, 'region'),
          tags: request.tags,
          exclude: [...(origin ? [origin] : []), ...request.excludeDestinations],
        })
        .slice(0, maxCandidates);
      return succeed(
        ...cities.map((city) => ({
          assign: { destination: city.name, destination_region: city.region },
          label: city.name,
        })),
      );
    },
  };

  const selectTransport: Tool = {
    name: 'select_transport',
    description: 'Choose a transport mode (plane, train or bus)',
    stepCost: TRAVEL_TOOL_COSTS.select_transport,
    preconditions: (state) => isAssigned(state.slots, 'destination') && !isAssigned(state.slots, 'transport'),
    proposeArgs: () => {
      if (request.transport) {
        return [{ mode: request.transport }];
      }
      const preferred = request.preferredTransport;
      const modes: ReadonlyArray<TransportMode> = preferred
        ? [preferred, ...TRANSPORT_MODES.filter((mode) => mode !== preferred)]
        : TRANSPORT_MODES;
      return modes.map((mode) => ({ mode }));
    },
    apply: (state, args) => {
      const fault = injectedFault('select_transport');
      if (fault) {
        return fault;
      }
      const mode = transportModeSchema.safeParse(args.mode);
      if (!mode.success) {
        return fail('error', `Unsupported transport mode '${String(args.mode)}'`);
      }
      const origin = lookup(slotString(state, 'origin'), 'origin');
      if ('status' in origin) {
        return origin;
      }
      const destination = lookup(slotString(state, 'destination'), 'destination');
      if ('status' in destination) {
        return destination;
      }
      if (origin.continent !== destination.continent && mode.data !== 'plane') {
        return fail(
          'precondition',
          `${mode.data} cannot reach ${destination.name} (${destination.continent}) from ${origin.name} (${origin.continent})`,
        );
      }
      return succeed({ assign: { transport: mode.data }, label: mode.data });
    },
  };

  const confirmBooking: Tool = {
    name: 'confirm_booking',
    description: 'Finalize the booking and mark it as confirmed',
    stepCost: TRAVEL_TOOL_COSTS.confirm_booking,
    preconditions: (state) => isAssigned(state.slots, 'transport') && !isAssigned(state.slots, 'booking'),
    apply: () => injectedFault('confirm_booking') ?? succeed({ assign: { booking: true } }),
  };

  return [setOrigin, setDestination, selectTransport, confirmBooking];
}

export function isTravelToolName(name: string): name is TravelToolName {
  return Object.prototype.hasOwnProperty.call(TRAVEL_TOOL_COSTS, name);
}
