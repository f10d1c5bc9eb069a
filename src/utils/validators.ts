import dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import { AutomationConfigSchema, type AutomationConfig } from '../types/AutomationConfig';

// Load environment variables from .env file
dotenv.config();

function parseNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Loads and validates automation configuration from environment variables
 * @returns Validated automation configuration
 * @throws Error if configuration is invalid
 */
export function loadConfig(): AutomationConfig {
  const config = {
    baseUrl: process.env.BASE_URL || undefined,
    email: process.env.PORTAL_EMAIL || undefined,
    password: process.env.PORTAL_PASSWORD || undefined,
    headless: parseBoolean(process.env.HEADLESS),
    browserTimeoutMs: parseNumber(process.env.BROWSER_TIMEOUT_MS),
    outputDir: process.env.OUTPUT_DIR || undefined,
    sessionStatePath: process.env.SESSION_STATE_PATH || undefined,
    requestsPerMinute: parseNumber(process.env.REQUESTS_PER_MINUTE),
    burstSize: parseNumber(process.env.BURST_SIZE),
    maxConcurrent: parseNumber(process.env.MAX_CONCURRENT),
    scrollPauseMs: parseNumber(process.env.SCROLL_PAUSE_MS),
    logLevel: process.env.LOG_LEVEL || undefined,
    databasePath: process.env.DATABASE_PATH || undefined,
  };

  const result = AutomationConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return result.data;
}
