import { z } from "zod";

const unitInterval = z.number().min(0).max(1);

export const scoreDistributionSchema = z.record(z.string().min(1), unitInterval);

export const classificationResultSchema = z.object({
  label: z.string().min(1),
  confidence: unitInterval,
  scoreDistribution: scoreDistributionSchema,
  modelVersion: z.string().min(1).optional(),
  processingTimeMs: z.number().int().nonnegative().optional(),
});

export const failureReasonSchema = z.object({
  kind: z.enum(["PayloadUnavailable", "AdapterError", "Timeout"]),
  detail: z.string(),
});
