/**
 * DAQLINK Core Package
 *
 * Shared types, schemas, errors and logging for the instrument client
 * and the container decoder.
 *
 * Usage:
 *   import { RecorderSetup, NotFoundError, createLogger } from '@daqlink/core';
 */

export * from './types';
export * from './errors';
export * from './schemas';
export { sleep } from './timing';
export {
  createLogger,
  log,
  setConsoleOutput,
  setDebug,
  isDebugEnabled,
  getLogBuffer,
  clearLog,
  exportLog,
  type Logger,
} from './logger';
