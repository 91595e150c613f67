import assert from 'node:assert/strict';
import { once } from 'node:events';
import { request as httpRequest } from 'node:http';
import test, { type TestContext } from 'node:test';
import { loadCatalog } from '@waypoint/travel-tools';
import { createLogger } from './logging';
import { PlannerRuntime } from './runtime';
import { createPlannerHttpServer } from './server';

async function startEphemeralServer() {
  const logger = createLogger({ test: 'planner-http' }, { sink: () => undefined });
  const runtime = new PlannerRuntime(logger, { catalog: loadCatalog() });
  const server = createPlannerHttpServer(runtime, logger);

  try {
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
  } catch (error) {
    server.close();
    throw error;
  }

  const address = server.address();
  if (!address || typeof address === 'string') {
    server.close();
    throw new Error('Unable to resolve ephemeral server address');
  }

  return { server, port: address.port };
}

async function withServer(t: TestContext, run: (port: number) => Promise<void>): Promise<void> {
  let started: Awaited<ReturnType<typeof startEphemeralServer>>;
  try {
    started = await startEphemeralServer();
  } catch (error) {
    const code = error instanceof Error ? Reflect.get(error, 'code') : undefined;
    if (code === 'EPERM' || code === 'EACCES') {
      t.skip(`Local socket bind blocked in this environment: ${code}`);
      return;
    }
    throw error;
  }

  try {
    await run(started.port);
  } finally {
    started.server.close();
  }
}

async function httpText(
  port: number,
  method: 'GET' | 'POST',
  path: string,
  body?: unknown,
): Promise<{ statusCode: number; contentType: string; text: string }> {
  const payload = body === undefined ? undefined : JSON.stringify(body);
  return new Promise((resolve, reject) => {
    const req = httpRequest(
      {
        host: '127.0.0.1',
        port,
        path,
        method,
        headers:
          payload === undefined
            ? undefined
            : {
                'content-type': 'application/json',
                'content-length': Buffer.byteLength(payload),
              },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
        res.on('end', () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            contentType: res.headers['content-type'] ?? '',
            text: Buffer.concat(chunks).toString('utf8'),
          });
        });
      },
    );
    req.on('error', reject);
    if (payload !== undefined) {
      req.write(payload);
    }
    req.end();
  });
}

function field(value: unknown, key: string): unknown {
  assert.ok(value && typeof value === 'object', `expected an object holding ${key}`);
  return Reflect.get(value, key);
}

function parseEvents(text: string): Array<{ event: string; data: unknown }> {
  return text
    .split('\n\n')
    .filter((block) => block.trim() !== '')
    .map((block) => {
      const [eventLine, dataLine] = block.split('\n');
      assert.match(eventLine, /^event: /);
      assert.match(dataLine, /^data: /);
      return { event: eventLine.slice('event: '.length), data: JSON.parse(dataLine.slice('data: '.length)) };
    });
}

test('health reports the service', async (t) => {
  await withServer(t, async (port) => {
    const response = await httpText(port, 'GET', '/health');
    assert.equal(response.statusCode, 200);
    assert.deepEqual(JSON.parse(response.text), { ok: true, service: 'waypoint-planner-server' });
  });
});

test('plan returns a successful booking plan', async (t) => {
  await withServer(t, async (port) => {
    const response = await httpText(port, 'POST', '/plan', {
      travel: { origin: 'New York', region: 'Northern Europe' },
    });
    const json: unknown = JSON.parse(response.text);

    assert.equal(response.statusCode, 200);
    assert.equal(field(json, 'status'), 'success');
    assert.equal(field(field(field(json, 'finalState'), 'slots'), 'transport'), 'plane');
  });
});

test('plan validates the payload shape', async (t) => {
  await withServer(t, async (port) => {
    const missingOrigin = await httpText(port, 'POST', '/plan', { travel: { region: 'Northern Europe' } });
    assert.equal(missingOrigin.statusCode, 400);
    assert.deepEqual(JSON.parse(missingOrigin.text), {
      error: 'Invalid payload: travel.origin: Required',
      issues: ['travel.origin: Required'],
    });

    const empty = await httpText(port, 'POST', '/plan');
    assert.equal(empty.statusCode, 400);
    assert.equal(field(JSON.parse(empty.text), 'error'), 'Invalid payload: <root>: request body is empty');
  });
});

test('execute streams planner, step and done events', async (t) => {
  await withServer(t, async (port) => {
    const response = await httpText(port, 'POST', '/execute', {
      travel: { origin: 'New York', region: 'Northern Europe' },
    });

    assert.equal(response.statusCode, 200);
    assert.equal(response.contentType, 'text/event-stream; charset=utf-8');
    const events = parseEvents(response.text);
    assert.deepEqual(
      events.map((event) => event.event),
      ['planner', 'step', 'step', 'step', 'step', 'done'],
    );
    assert.equal(field(events[5].data, 'goalReached'), true);
    assert.equal(field(events[1].data, 'tool'), 'set_origin');
  });
});

test('evaluate returns hint gain for every request', async (t) => {
  await withServer(t, async (port) => {
    const response = await httpText(port, 'POST', '/evaluate', {
      requests: [{ origin: 'New York', region: 'Northern Europe' }],
    });
    const runs = field(JSON.parse(response.text), 'runs');

    assert.equal(response.statusCode, 200);
    assert.ok(Array.isArray(runs));
    assert.equal(runs.length, 1);
    assert.equal(field(runs[0], 'label'), 'New York -> Northern Europe');
  });
});

test('unknown routes and methods are rejected', async (t) => {
  await withServer(t, async (port) => {
    const missing = await httpText(port, 'GET', '/routes');
    assert.equal(missing.statusCode, 404);

    const wrongMethod = await httpText(port, 'GET', '/plan');
    assert.equal(wrongMethod.statusCode, 405);
    assert.deepEqual(JSON.parse(wrongMethod.text), { error: 'Method not allowed', allowed: ['POST'] });
  });
});
