import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { SearchConfigIoError, SearchConfigSchemaError } from './errors';

export const heuristicModeSchema = z.enum(['with_hint', 'no_hint']);
export type HeuristicMode = z.infer<typeof heuristicModeSchema>;

export const searchConfigSchema = z.object({
  mode: heuristicModeSchema.default('no_hint'),
  hintWeight: z.number().min(0).max(1).default(0.5),
  maxExpansions: z.number().int().positive().default(1000),
  maxToolCalls: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).default(2),
  perCallTimeoutMs: z.number().int().positive().default(10_000),
  deadlineMs: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().default(1),
  slotCost: z.number().min(0).default(1),
  constraintCost: z.number().min(0).default(1),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;

const searchConfigFileSchema = z.object({
  version: z.number().int().positive().default(1),
  search: searchConfigSchema.default({}),
});

export type SearchConfigFile = z.infer<typeof searchConfigFileSchema>;

export function resolveSearchConfig(input: SearchConfigInput = {}): SearchConfig {
  const result = searchConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SearchConfigSchemaError('<inline>', result.error.message);
  }
  return result.data;
}

export function parseSearchConfigYaml(rawYaml: string, filePath = 'waypoint.yaml'): SearchConfig {
  const parsed: unknown = YAML.parse(rawYaml) ?? {};
  const result = searchConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new SearchConfigSchemaError(filePath, result.error.message);
  }
  return result.data.search;
}

export function loadSearchConfig(filePath: string): SearchConfig {
  let rawYaml: string;

  try {
    rawYaml = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new SearchConfigIoError(filePath, error);
  }

  return parseSearchConfigYaml(rawYaml, filePath);
}
