import { z } from 'zod';

/**
 * Options of the convert command as commander hands them over.
 */
export const convertOptionsSchema = z.object({
  file: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
  stdout: z.boolean().default(false),
  yaml: z.boolean().default(false),
  deployment: z.boolean().default(false),
  daemonset: z.boolean().default(false),
  replicaset: z.boolean().default(false),
  chart: z.boolean().default(false),
  outputDir: z.string().min(1).default('.'),
});

export type ConvertOptionsInput = z.input<typeof convertOptionsSchema>;
export type ConvertOptions = z.output<typeof convertOptionsSchema>;
