import { z } from 'zod';

export const healthResponseSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;

export function buildHealthPayload(at: Date = new Date()): HealthResponse {
  return { status: 'ok', timestamp: at.toISOString() };
}
