import { z } from 'zod';

// crt.sh JSON output; name_value holds newline-separated names
export const CtLogEntrySchema = z.object({
  name_value: z.string(),
});

export const CtLogResponseSchema = z.array(CtLogEntrySchema);

// Breach service: only the list length is kept
export const BreachListSchema = z.array(
  z.object({
    Name: z.string(),
  }).passthrough()
);

export type CtLogEntry = z.infer<typeof CtLogEntrySchema>;
