import { z } from 'zod';

export const transportModeSchema = z.enum(['plane', 'train', 'bus']);
export type TransportMode = z.infer<typeof transportModeSchema>;

export const TRANSPORT_MODES: ReadonlyArray<TransportMode> = transportModeSchema.options;

export const travelRequestSchema = z.object({
  origin: z.string().trim().min(1),
  region: z.string().trim().min(1).optional(),
  tags: z.array(z.string().trim().min(1)).default([]),
  transport: transportModeSchema.optional(),
  preferredTransport: transportModeSchema.optional(),
  excludeDestinations: z.array(z.string().trim().min(1)).default([]),
});

export type TravelRequest = z.infer<typeof travelRequestSchema>;
export type TravelRequestInput = z.input<typeof travelRequestSchema>;

export function sameName(left: string, right: string): boolean {
  return left.trim().toLowerCase() === right.trim().toLowerCase();
}
