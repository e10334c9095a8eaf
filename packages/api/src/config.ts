/**
 * Environment Configuration
 *
 * Reads DAQ_* settings from the process environment, after loading
 * `.env.local` and `.env` from the working directory.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { InvalidParameterError } from '@core/errors';
import type { InstrumentOptions } from './instrument';

const milliseconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const interval = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  DAQ_ADDRESS: z.string().trim().min(1, 'DAQ_ADDRESS is required'),
  DAQ_REQUEST_TIMEOUT_MS: milliseconds(10_000),
  DAQ_POLL_INTERVAL_MS: interval(250),
  DAQ_FINALIZE_TIMEOUT_MS: milliseconds(30_000),
  DAQ_FINISH_DELAY_MS: milliseconds(4_000),
  DAQ_DOWNLOAD_DIR: z.string().min(1).default('data'),
  DAQ_DEBUG: flag,
});

export interface DaqConfig {
  address: string;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  finalizeTimeoutMs: number;
  finishDelayMs: number;
  downloadDir: string;
  debug: boolean;
}

/**
 * Load `.env.local` then `.env` into process.env. Variables already set
 * are left alone, so the first file to define a name wins.
 */
export function loadEnvFiles(): void {
  dotenvConfig({ path: '.env.local' });
  dotenvConfig({ path: '.env' });
}

/**
 * Validate an environment map.
 */
export function parseConfig(env: Record<string, string | undefined>): DaqConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const parameter = String(issue.path[0] ?? 'env');
    throw new InvalidParameterError(`${parameter}: ${issue.message}`, parameter, env[parameter]);
  }

  const data = parsed.data;
  return {
    address: data.DAQ_ADDRESS,
    requestTimeoutMs: data.DAQ_REQUEST_TIMEOUT_MS,
    pollIntervalMs: data.DAQ_POLL_INTERVAL_MS,
    finalizeTimeoutMs: data.DAQ_FINALIZE_TIMEOUT_MS,
    finishDelayMs: data.DAQ_FINISH_DELAY_MS,
    downloadDir: data.DAQ_DOWNLOAD_DIR,
    debug: data.DAQ_DEBUG,
  };
}

/**
 * Read the configuration. The .env files are loaded only when reading
 * process.env itself; a caller-supplied map is used as is.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DaqConfig {
  if (env === process.env) {
    loadEnvFiles();
  }
  return parseConfig(env);
}

export function instrumentOptionsFrom(config: DaqConfig): InstrumentOptions {
  return {
    requestTimeoutMs: config.requestTimeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    finalizeTimeoutMs: config.finalizeTimeoutMs,
    finishDelayMs: config.finishDelayMs,
  };
}
