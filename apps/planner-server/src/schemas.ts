import { searchConfigSchema } from '@waypoint/planning-core';
import { travelRequestSchema } from '@waypoint/travel-tools';
import { z } from 'zod';

export const hintChoiceSchema = z.enum(['none', 'reference', 'llm']);
export type HintChoice = z.infer<typeof hintChoiceSchema>;

export const failureKindSchema = z.enum([
  'timeout',
  'rate_limit',
  'unavailable',
  'precondition',
  'contradiction',
  'empty_result',
  'error',
  'cancelled',
]);

const faultQueueSchema = z.array(failureKindSchema).max(20).optional();

export const searchOverridesSchema = searchConfigSchema.omit({ mode: true }).partial().strict();

export const toolOptionsSchema = z
  .object({
    maxDestinationCandidates: z.number().int().positive().max(20).optional(),
    faults: z
      .object({
        set_origin: faultQueueSchema,
        set_destination: faultQueueSchema,
        select_transport: faultQueueSchema,
        confirm_booking: faultQueueSchema,
      })
      .strict()
      .optional(),
  })
  .strict();

export const planRequestSchema = z.object({
  travel: travelRequestSchema,
  hint: hintChoiceSchema.optional(),
  search: searchOverridesSchema.default({}),
  tools: toolOptionsSchema.default({}),
});

export type PlanRequest = z.infer<typeof planRequestSchema>;
export type PlanRequestInput = z.input<typeof planRequestSchema>;

export const evaluateRequestSchema = z.object({
  requests: z.array(travelRequestSchema).min(1).max(50),
  hint: hintChoiceSchema.exclude(['none']).default('reference'),
  search: searchOverridesSchema.default({}),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
export type EvaluateRequestInput = z.input<typeof evaluateRequestSchema>;

export class RequestValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid payload: ${issues.join('; ')}`);
    this.name = 'RequestValidationError';
  }
}

export function parseRequest<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`),
    );
  }
  return result.data;
}
