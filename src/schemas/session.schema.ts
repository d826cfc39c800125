import { z } from 'zod';

export const tunnelRecordSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  link: z.string().min(1),
  processId: z.number().int().positive().nullable(),
  token: z.string(),
});

/**
 * Shape of the state file: session key → tunnel record.
 */
export const sessionFileSchema = z.record(z.string(), tunnelRecordSchema);

export type SessionFileSchema = z.infer<typeof sessionFileSchema>;
