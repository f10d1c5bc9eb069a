import { z } from 'zod';

/**
 * Schema for automation configuration
 * Static for the life of a process; no runtime reconfiguration
 */
export const AutomationConfigSchema = z.object({
  baseUrl: z.string().url().default('https://internshala.com'),
  email: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  headless: z.boolean().default(true),
  browserTimeoutMs: z.number().int().positive().default(30000),
  outputDir: z.string().min(1).default('./exports'),
  sessionStatePath: z.string().min(1).default('./session_state.json'),
  requestsPerMinute: z.number().positive().default(30),
  burstSize: z.number().positive().optional(),
  maxConcurrent: z.number().int().positive().default(3),
  scrollPauseMs: z.number().int().nonnegative().default(1500),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  databasePath: z.string().min(1).optional(),
});

/**
 * TypeScript type for automation configuration
 */
export type AutomationConfig = z.infer<typeof AutomationConfigSchema>;
