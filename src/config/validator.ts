import { z } from 'zod';

export const BackendSchema = z.enum(['docker', 'e2b']);
export const RuntimeSchema = z.enum(['python', 'node']);

export const ConfigSchema = z.object({
  loop: z.object({
    max_attempts: z.coerce.number().int().min(1).max(50),
  }),
  oracle: z.object({
    api_key: z.string().default(''),
    model: z.string().min(1),
    base_url: z.string().url(),
    temperature: z.coerce.number().min(0).max(2),
    timeout_ms: z.coerce.number().int().positive(),
  }),
  sandbox: z.object({
    backend: BackendSchema,
    runtime: RuntimeSchema,
    image: z.string().min(1).optional(),
    memory_limit: z.string().regex(/^\d+[kmg]$/i, 'memory_limit must look like 256m, 1g or 512000k'),
    cpu_shares: z.coerce.number().int().min(2).max(262144),
    timeout_ms: z.coerce.number().int().positive(),
    max_output_chars: z.coerce.number().int().positive(),
  }),
  e2b: z.object({
    api_key: z.string().default(''),
    template: z.string().min(1),
  }),
  output: z.object({
    dir: z.string().min(1),
  }),
  illustration: z.object({
    enabled: z.boolean(),
    model: z.string().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Backend = z.infer<typeof BackendSchema>;
export type Runtime = z.infer<typeof RuntimeSchema>;
