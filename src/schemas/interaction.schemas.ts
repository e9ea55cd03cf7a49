import { z } from 'zod';

export const transceiverSampleSchema = z.object({
  entityType: z.enum(['controller', 'flight']),
  callsign: z.string().trim().min(1),
  frequencyHz: z.number().int().positive(),
  timestamp: z.date(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const matcherOptionsSchema = z.object({
  timeWindowSeconds: z.number().finite().positive(),
  proximityThresholdNm: z.number().finite().positive(),
});

export const aggregatorOptionsSchema = z.object({
  gapToleranceSeconds: z.number().finite().positive(),
});

export const analysisWindowSchema = z.object({
  start: z.date(),
  end: z.date(),
}).refine((window) => window.start.getTime() <= window.end.getTime(), {
  message: 'start must not be after end',
  path: ['start'],
});

export const analyzeWindowArgsSchema = z.object({
  start: z.coerce.date(),
  end: z.coerce.date(),
  persist: z.boolean().default(false),
});

export type AnalyzeWindowArgs = z.infer<typeof analyzeWindowArgsSchema>;

/**
 * Flattens zod issues into "path: message" strings for error payloads
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message));
}
