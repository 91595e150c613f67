import assert from 'node:assert/strict';
import test from 'node:test';
import { createLogger, type LogLevel } from './logging';

function capture() {
  const lines: Array<{ level: LogLevel; payload: Record<string, unknown> }> = [];
  const sink = (level: LogLevel, line: string) => {
    const payload: unknown = JSON.parse(line);
    assert.ok(payload && typeof payload === 'object' && !Array.isArray(payload));
    lines.push({ level, payload: { ...payload } });
  };
  return { lines, sink };
}

test('json logger writes one event per line with bindings from every child', () => {
  const { lines, sink } = capture();
  const logger = createLogger({ service: 'planner' }, { sink });

  logger.child({ requestId: 'req-1' }).child({ component: 'search' }).info('search.start', { mode: 'no_hint' });

  assert.equal(lines.length, 1);
  const { ts, ...rest } = lines[0].payload;
  assert.equal(typeof ts, 'string');
  assert.deepEqual(rest, {
    level: 'info',
    event: 'search.start',
    service: 'planner',
    requestId: 'req-1',
    component: 'search',
    mode: 'no_hint',
  });
});

test('events below the configured level are dropped', () => {
  const { lines, sink } = capture();
  const logger = createLogger({}, { level: 'warn', sink });

  logger.debug('search.expand');
  logger.info('search.finish');
  logger.warn('heuristic.hint.degraded');
  logger.error('http.plan.error');

  assert.deepEqual(
    lines.map((line) => [line.level, line.payload.event]),
    [
      ['warn', 'heuristic.hint.degraded'],
      ['error', 'http.plan.error'],
    ],
  );
});

test('errors are serialized with name and message', () => {
  const { lines, sink } = capture();
  const error = new RangeError('too far');

  createLogger({}, { sink }).error('http.plan.error', { error });

  const serialized = lines[0].payload.error;
  assert.ok(serialized && typeof serialized === 'object');
  assert.equal(Reflect.get(serialized, 'name'), 'RangeError');
  assert.equal(Reflect.get(serialized, 'message'), 'too far');
});
