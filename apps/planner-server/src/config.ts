import { z } from 'zod';

export const hintBackendSchema = z.enum(['none', 'llm']);
export type HintBackend = z.infer<typeof hintBackendSchema>;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  WAYPOINT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  WAYPOINT_SEARCH_CONFIG: optionalString,
  WAYPOINT_CATALOG: optionalString,
  WAYPOINT_HINT: hintBackendSchema.default('none'),
  WAYPOINT_LLM_ENDPOINT: z.string().trim().url().optional(),
  WAYPOINT_LLM_MODEL: optionalString,
  WAYPOINT_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  OPENAI_API_KEY: optionalString,
});

export interface ServerConfig {
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  searchConfigPath?: string;
  catalogPath?: string;
  hint: HintBackend;
  llm: {
    endpoint?: string;
    model?: string;
    timeoutMs: number;
    apiKey?: string;
  };
}

export class ServerConfigError extends Error {
  constructor(message: string) {
    super(`Invalid server configuration: ${message}`);
    this.name = 'ServerConfigError';
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ServerConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    logLevel: parsed.WAYPOINT_LOG_LEVEL,
    searchConfigPath: parsed.WAYPOINT_SEARCH_CONFIG,
    catalogPath: parsed.WAYPOINT_CATALOG,
    hint: parsed.WAYPOINT_HINT,
    llm: {
      endpoint: parsed.WAYPOINT_LLM_ENDPOINT,
      model: parsed.WAYPOINT_LLM_MODEL,
      timeoutMs: parsed.WAYPOINT_LLM_TIMEOUT_MS,
      apiKey: parsed.OPENAI_API_KEY,
    },
  };
}
