import { z } from 'zod';
import { isValidHostname, normalizeHostname } from '../utils/domain.js';

export const ScanRequestSchema = z.object({
  domain: z
    .string()
    .transform(normalizeHostname)
    .refine(isValidHostname, { message: 'domain must be a fully qualified hostname' }),
  includeSubdomains: z.boolean().default(false),
  requester: z.string().min(1),
});

export type ScanRequestInput = z.input<typeof ScanRequestSchema>;
