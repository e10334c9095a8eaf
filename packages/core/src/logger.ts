/**
 * Logging Utility
 * Provides timestamped, tagged logging with a buffer for export
 */

import { writeFile } from 'fs/promises';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(msg: string): void;
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string, err?: unknown): void;
}

const logBuffer: string[] = [];
const MAX_BUFFER_SIZE = 500;

let consoleOutput = true;
let debugEnabled = false;

/**
 * Echo entries to the console (default: true)
 */
export function setConsoleOutput(enabled: boolean): void {
    consoleOutput = enabled;
}

/**
 * Record debug entries (default: false)
 */
export function setDebug(enabled: boolean): void {
    debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
    return debugEnabled;
}

/**
 * Log a message with timestamp
 * @param msg - Message to log
 * @param level - Console channel to echo on (default: 'info')
 */
export function log(msg: string, level: LogLevel = 'info'): void {
    if (level === 'debug' && !debugEnabled) {
        return;
    }

    const time = new Date().toLocaleTimeString('en-GB', { hour12: false });
    const entry = `[${time}] ${msg}`;

    logBuffer.push(entry);
    if (logBuffer.length > MAX_BUFFER_SIZE) {
        logBuffer.shift();
    }

    if (!consoleOutput) {
        return;
    }
    switch (level) {
        case 'error':
            console.error(msg);
            break;
        case 'warn':
            console.warn(msg);
            break;
        default:
            console.log(msg);
    }
}

/**
 * Create a logger whose entries are prefixed with `[tag]`
 */
export function createLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        debug: (msg) => log(`${prefix} ${msg}`, 'debug'),
        info: (msg) => log(`${prefix} ${msg}`, 'info'),
        warn: (msg) => log(`${prefix} ${msg}`, 'warn'),
        error: (msg, err) => {
            const detail = err instanceof Error ? `: ${err.message}` : '';
            log(`${prefix} ${msg}${detail}`, 'error');
        },
    };
}

/**
 * Get the log buffer
 */
export function getLogBuffer(): string[] {
    return [...logBuffer];
}

/**
 * Clear the log buffer
 */
export function clearLog(): void {
    logBuffer.length = 0;
}

/**
 * Write the log buffer to a file
 * @returns Path written
 */
export async function exportLog(filename?: string): Promise<string> {
    const target = filename ?? `log-${Date.now()}.txt`;
    await writeFile(target, logBuffer.join('\n') + '\n', 'utf-8');
    log('Log exported');
    return target;
}

// ===== Default Export =====

export default {
    setConsoleOutput,
    setDebug,
    log,
    createLogger,
    getLogBuffer,
    clearLog,
    exportLog,
};
