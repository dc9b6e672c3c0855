import { z } from 'zod';

const stringList = z.array(z.string());
const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const portObjectSchema = z.object({
  target: z.number(),
  published: z.union([z.number(), z.string()]).optional(),
});

const volumeObjectSchema = z.object({
  type: z.string().optional(),
  source: z.string().optional(),
  target: z.string(),
  read_only: z.boolean().optional(),
});

export const serviceSchema = z
  .object({
    image: z.string().optional(),
    command: z.union([z.string(), stringList]).optional(),
    working_dir: z.string().optional(),
    environment: z.union([z.array(z.string()), z.record(scalar)]).optional(),
    ports: z.array(z.union([z.string(), z.number(), portObjectSchema])).optional(),
    volumes: z.array(z.union([z.string(), volumeObjectSchema])).optional(),
    links: stringList.optional(),
    labels: z.union([stringList, z.record(scalar)]).optional(),
    privileged: z.boolean().optional(),
    restart: z.string().optional(),
  })
  .passthrough();

export const composeSchema = z
  .object({
    version: z.union([z.string(), z.number()]).optional(),
    services: z.record(serviceSchema),
  })
  .passthrough();

export type ServiceInput = z.output<typeof serviceSchema>;
export type ComposeInput = z.output<typeof composeSchema>;
