import { z } from 'zod';

export const outputFormatSchema = z.enum(['json', 'table', 'csv']);

export const extractSchema = z.object({
  file: z.string().min(1),
  format: outputFormatSchema.default('table'),
  sink: z.boolean().default(true),
  outDir: z.string().min(1).optional(),
  worksheet: z
    .string()
    .regex(/^[\w.-]+$/, 'must contain only letters, digits, "_", "-" or "."')
    .optional(),
  config: z.string().min(1).optional(),
});

export type OutputFormat = z.infer<typeof outputFormatSchema>;
export type ExtractArgs = z.infer<typeof extractSchema>;
