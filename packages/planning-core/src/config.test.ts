import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import assert from 'node:assert/strict';
import test from 'node:test';
import { loadSearchConfig, parseSearchConfigYaml, resolveSearchConfig } from './config';
import { SearchConfigIoError, SearchConfigSchemaError } from './errors';

test('search config defaults match the documented values', () => {
  assert.deepEqual(resolveSearchConfig(), {
    mode: 'no_hint',
    hintWeight: 0.5,
    maxExpansions: 1000,
    maxRetries: 2,
    perCallTimeoutMs: 10_000,
    concurrency: 1,
    slotCost: 1,
    constraintCost: 1,
  });
});

test('search config is read from the search section of a YAML file', () => {
  const rootDir = mkdtempSync(path.join(tmpdir(), 'waypoint-config-'));
  const filePath = path.join(rootDir, 'waypoint.yaml');
  writeFileSync(
    filePath,
    `version: 1
search:
  mode: with_hint
  hintWeight: 0.7
  maxExpansions: 50
  maxToolCalls: 200
`,
    'utf8',
  );

  const config = loadSearchConfig(filePath);

  assert.equal(config.mode, 'with_hint');
  assert.equal(config.hintWeight, 0.7);
  assert.equal(config.maxExpansions, 50);
  assert.equal(config.maxToolCalls, 200);
  assert.equal(config.maxRetries, 2);
});

test('an empty YAML document yields the defaults', () => {
  assert.equal(parseSearchConfigYaml('').maxExpansions, 1000);
});

test('out-of-range values are rejected with a schema error', () => {
  assert.throws(
    () => parseSearchConfigYaml('search:\n  hintWeight: 2\n', 'bad.yaml'),
    (error: unknown) => error instanceof SearchConfigSchemaError && error.filePath === 'bad.yaml',
  );
  assert.throws(() => resolveSearchConfig({ maxRetries: -1 }), SearchConfigSchemaError);
});

test('a missing file is reported as an I/O error', () => {
  const missing = path.join(tmpdir(), 'waypoint-missing', 'nope.yaml');

  assert.throws(
    () => loadSearchConfig(missing),
    (error: unknown) => error instanceof SearchConfigIoError && error.filePath === missing,
  );
});
