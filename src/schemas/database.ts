import { z } from 'zod';

export const ScanStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

export const ScanPhaseSchema = z.enum(['queued', 'discovery', 'enrichment', 'analysis', 'persistence', 'done']);

export const ScanRunRowSchema = z.object({
  id: z.string(),
  domain: z.string(),
  include_subdomains: z.boolean(),
  requester: z.string(),
  status: ScanStatusSchema,
  progress: z.number(),
  current_phase: ScanPhaseSchema,
  assets_discovered: z.number(),
  high_risk_count: z.number(),
  critical_count: z.number(),
  created_at: z.coerce.date(),
  started_at: z.coerce.date().nullable(),
  completed_at: z.coerce.date().nullable(),
  error_message: z.string().nullable(),
});

export type ScanRunRow = z.infer<typeof ScanRunRowSchema>;
