import { z } from 'zod';

export const SessionOptionsSchema = z.object({
  timeout: z.number().positive().optional(), // default expect timeout, ms
  eol: z.string().default(''),
  sendDelay: z.number().nonnegative().default(0),
  sliceMs: z.number().positive().default(100),
  chunkSize: z.number().int().positive().default(64 * 1024),
  name: z.string().min(1).default('xterm'),
  cols: z.number().int().positive().default(80),
  rows: z.number().int().positive().default(24),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type SessionOptionsInput = z.input<typeof SessionOptionsSchema>;
export type Config = z.infer<typeof SessionOptionsSchema>;
