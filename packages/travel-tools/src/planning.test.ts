import assert from 'node:assert/strict';
import test from 'node:test';
import { createInitialState, replayPlan, runSearch } from '@waypoint/planning-core';
import { loadCatalog } from './catalog';
import { buildTravelGoal, initialTravelSlots } from './goal';
import { ReferencePlanHint } from './hint';
import type { TravelRequestInput } from './request';
import { createTravelTools, type TravelToolOptions } from './tools';

const catalog = loadCatalog();

function plan(request: TravelRequestInput, options: TravelToolOptions = {}, withHint = false) {
  return runSearch(initialTravelSlots(), {
    tools: createTravelTools(catalog, request, options),
    goal: buildTravelGoal(request),
    config: withHint ? { mode: 'with_hint' } : {},
    hintSource: withHint ? new ReferencePlanHint() : undefined,
  });
}

test('books a plane from New York to a Northern European city in four steps', async () => {
  const result = await plan({ origin: 'New York', region: 'Northern Europe' });

  assert.equal(result.status, 'success');
  assert.deepEqual(
    result.plan.map((step) => step.tool),
    ['set_origin', 'set_destination', 'select_transport', 'confirm_booking'],
  );
  assert.deepEqual(result.finalState?.slots, {
    origin: 'New York',
    destination: 'Oslo',
    destination_region: 'Northern Europe',
    transport: 'plane',
    booking: true,
  });
  assert.ok(Math.abs((result.finalState?.g ?? 0) - 5.2) < 1e-9);
  assert.equal(result.trace.stats.expansions, 8);
  assert.equal(result.trace.stats.toolCalls, 14);
  assert.equal(result.trace.stats.failures, 6);
  assert.equal(result.trace.stats.prunedByFailure, 6);
});

test('the reference plan hint finds the same plan', async () => {
  const result = await plan({ origin: 'New York', region: 'Northern Europe' }, {}, true);

  assert.equal(result.status, 'success');
  assert.equal(result.plan.length, 4);
  assert.equal(result.finalState?.slots.transport, 'plane');
  assert.equal(result.trace.degraded, null);
});

test('a soft transport preference wins when every mode is possible', async () => {
  const result = await plan({ origin: 'Oslo', region: 'Northern Europe', preferredTransport: 'train' });

  assert.equal(result.status, 'success');
  assert.equal(result.finalState?.slots.destination, 'Stockholm');
  assert.equal(result.finalState?.slots.transport, 'train');
  assert.equal(result.finalState?.constraints['preferred-transport'], 'satisfied');
});

test('excluded destinations are never chosen', async () => {
  const result = await plan({ origin: 'New York', region: 'Northern Europe', excludeDestinations: ['Oslo'] });

  assert.equal(result.status, 'success');
  assert.equal(result.finalState?.slots.destination, 'Stockholm');
});

test('an impossible fixed transport mode leaves the request unreachable', async () => {
  const result = await plan({ origin: 'New York', region: 'Northern Europe', transport: 'train' });

  assert.equal(result.status, 'unreachable');
  assert.deepEqual(result.plan, []);
  assert.equal(result.finalState, null);
  assert.equal(result.trace.stats.prunedByFailure, 3);
});

test('a rate-limited booking is retried and the plan keeps the successful attempt', async () => {
  const result = await plan(
    { origin: 'New York', region: 'Northern Europe' },
    { faults: { confirm_booking: ['rate_limit'] } },
  );

  assert.equal(result.status, 'success');
  assert.equal(result.trace.stats.retries, 1);
  assert.equal(result.plan[3].tool, 'confirm_booking');
  assert.equal(result.plan[3].attempt, 2);
});

test('a found plan replays to the same final state', async () => {
  const request = { origin: 'New York', region: 'Northern Europe' };
  const result = await plan(request);
  const goal = buildTravelGoal(request);

  const replay = await replayPlan(createInitialState(initialTravelSlots(), goal), result.plan, {
    tools: createTravelTools(catalog, request),
    goal,
    finalStateKey: result.finalState?.key,
  });

  assert.equal(replay.goalReached, true);
  assert.deepEqual(
    replay.steps.map((step) => Object.keys(step.diff)),
    [['origin'], ['destination', 'destination_region'], ['transport'], ['booking']],
  );
  assert.equal(replay.finalState.key, result.finalState?.key);
});
