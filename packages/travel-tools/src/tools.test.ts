import assert from 'node:assert/strict';
import test from 'node:test';
import { createInitialState, type Goal, type Tool, type ToolOutcome } from '@waypoint/planning-core';
import { loadCatalog } from './catalog';
import { buildTravelGoal, initialTravelSlots } from './goal';
import { ReferencePlanHint } from './hint';
import { createTravelTools } from './tools';

const catalog = loadCatalog();
const context = { signal: new AbortController().signal, attempt: 1 };

function toolNamed(tools: Tool[], name: string): Tool {
  const tool = tools.find((candidate) => candidate.name === name);
  assert.ok(tool, `missing tool ${name}`);
  return tool;
}

function stateWith(goal: Goal, slots: Record<string, string | boolean>) {
  return createInitialState({ ...initialTravelSlots(), ...slots }, goal);
}

function labels(outcome: ToolOutcome): Array<string | undefined> {
  assert.equal(outcome.status, 'ok');
  return outcome.status === 'ok' ? outcome.candidates.map((candidate) => candidate.label) : [];
}

test('tools are registered in booking order with their step costs', () => {
  const tools = createTravelTools(catalog, { origin: 'New York' });

  assert.deepEqual(
    tools.map((tool) => [tool.name, tool.stepCost]),
    [
      ['set_origin', 1],
      ['set_destination', 1],
      ['select_transport', 1.2],
      ['confirm_booking', 2],
    ],
  );
});

test('preconditions follow the booking order', () => {
  const request = { origin: 'New York' };
  const goal = buildTravelGoal(request);
  const tools = createTravelTools(catalog, request);
  const applicable = (slots: Record<string, string | boolean>) =>
    tools.filter((tool) => tool.preconditions(stateWith(goal, slots))).map((tool) => tool.name);

  assert.deepEqual(applicable({}), ['set_origin']);
  assert.deepEqual(applicable({ origin: 'New York' }), ['set_destination']);
  assert.deepEqual(applicable({ origin: 'New York', destination: 'Oslo' }), ['select_transport']);
  assert.deepEqual(applicable({ origin: 'New York', destination: 'Oslo', transport: 'plane' }), ['confirm_booking']);
  assert.deepEqual(applicable({ origin: 'New York', destination: 'Oslo', transport: 'plane', booking: true }), []);
});

test('set_origin resolves catalog names and rejects unknown cities', async () => {
  const goal = buildTravelGoal({ origin: 'new york' });
  const tools = createTravelTools(catalog, { origin: 'new york' });
  const setOrigin = toolNamed(tools, 'set_origin');
  const root = stateWith(goal, {});

  assert.deepEqual(setOrigin.proposeArgs?.(root), [{ city: 'new york' }]);
  assert.deepEqual(await setOrigin.apply(root, { city: 'new york' }, context), {
    status: 'ok',
    candidates: [{ assign: { origin: 'New York' }, label: 'New York' }],
  });
  assert.deepEqual(await setOrigin.apply(root, { city: 'Atlantis' }, context), {
    status: 'failed',
    failure: { kind: 'precondition', message: "Unknown origin city 'Atlantis'" },
  });
});

test('set_destination offers up to the configured number of cities in the region', async () => {
  const request = { origin: 'Oslo', region: 'Northern Europe', excludeDestinations: ['Helsinki'] };
  const goal = buildTravelGoal(request);
  const state = stateWith(goal, { origin: 'Oslo' });

  const three = toolNamed(createTravelTools(catalog, request), 'set_destination');
  assert.deepEqual(three.proposeArgs?.(state), [{ region: 'Northern Europe' }]);
  assert.deepEqual(labels(await three.apply(state, { region: 'Northern Europe' }, context)), [
    'Stockholm',
    'Copenhagen',
    'Reykjavik',
  ]);

  const one = toolNamed(createTravelTools(catalog, request, { maxDestinationCandidates: 1 }), 'set_destination');
  const outcome = await one.apply(state, { region: 'Northern Europe' }, context);
  assert.deepEqual(outcome, {
    status: 'ok',
    candidates: [
      { assign: { destination: 'Stockholm', destination_region: 'Northern Europe' }, label: 'Stockholm' },
    ],
  });
});

test('select_transport only allows planes between continents', async () => {
  const request = { origin: 'New York', preferredTransport: 'bus' as const };
  const goal = buildTravelGoal(request);
  const selectTransport = toolNamed(createTravelTools(catalog, request), 'select_transport');
  const transatlantic = stateWith(goal, { origin: 'New York', destination: 'Oslo' });
  const domestic = stateWith(goal, { origin: 'New York', destination: 'Boston' });

  assert.deepEqual(selectTransport.proposeArgs?.(transatlantic), [{ mode: 'bus' }, { mode: 'plane' }, { mode: 'train' }]);
  assert.deepEqual(await selectTransport.apply(transatlantic, { mode: 'train' }, context), {
    status: 'failed',
    failure: { kind: 'precondition', message: 'train cannot reach Oslo (Europe) from New York (North America)' },
  });
  assert.deepEqual(labels(await selectTransport.apply(transatlantic, { mode: 'plane' }, context)), ['plane']);
  assert.deepEqual(labels(await selectTransport.apply(domestic, { mode: 'bus' }, context)), ['bus']);
  assert.deepEqual(await selectTransport.apply(domestic, { mode: 'ferry' }, context), {
    status: 'failed',
    failure: { kind: 'error', message: "Unsupported transport mode 'ferry'" },
  });
});

test('a fixed transport mode is the only one proposed', () => {
  const request = { origin: 'New York', transport: 'train' as const };
  const goal = buildTravelGoal(request);
  const selectTransport = toolNamed(createTravelTools(catalog, request), 'select_transport');

  assert.deepEqual(selectTransport.proposeArgs?.(stateWith(goal, { origin: 'New York', destination: 'Boston' })), [
    { mode: 'train' },
  ]);
});

test('injected faults are returned by the first calls of a tool', async () => {
  const request = { origin: 'New York' };
  const goal = buildTravelGoal(request);
  const confirm = toolNamed(
    createTravelTools(catalog, request, { faults: { confirm_booking: ['rate_limit', 'unavailable'] } }),
    'confirm_booking',
  );
  const state = stateWith(goal, { origin: 'New York', destination: 'Boston', transport: 'train' });

  assert.deepEqual(await confirm.apply(state, {}, context), {
    status: 'failed',
    failure: { kind: 'rate_limit', message: 'confirm_booking failed with injected rate_limit' },
  });
  assert.equal((await confirm.apply(state, {}, context)).status, 'failed');
  assert.deepEqual(await confirm.apply(state, {}, context), { status: 'ok', candidates: [{ assign: { booking: true } }] });
});

test('invalid candidate limits are rejected', () => {
  assert.throws(() => createTravelTools(catalog, { origin: 'Oslo' }, { maxDestinationCandidates: 0 }), /positive integer/);
});

test('reference plan hint sums the cost of the remaining booking steps', () => {
  const goal = buildTravelGoal({ origin: 'New York' });
  const hint = new ReferencePlanHint();

  assert.equal(hint.estimate(stateWith(goal, {})), 5.2);
  assert.equal(hint.estimate(stateWith(goal, { origin: 'New York', destination: 'Oslo' })), 3.2);
  assert.equal(
    hint.estimate(stateWith(goal, { origin: 'New York', destination: 'Oslo', transport: 'plane', booking: true })),
    0,
  );
});
