/**
 * log.ts
 *
 * Minimal logging helpers. `debug` is gated by a flag and avoids throwing in
 * environments without console.
 */

const VITE_LOG_DEBUG = import.meta.env?.VITE_LOG_DEBUG;

function debugEnabled(): boolean {
    if (typeof window !== 'undefined' && window.__LOG_DEBUG === true) return true;
    return VITE_LOG_DEBUG === '1';
}

/**
 * Logs debug messages to the console if the debug flag is enabled.
 */
export function debug(...args: unknown[]) {
    if (debugEnabled() && typeof console !== 'undefined') console.log(...args);
}

export function info(...args: unknown[]) {
    console.log(...args);
}

export function warn(...args: unknown[]) {
    console.warn(...args);
}

export function error(...args: unknown[]) {
    console.error(...args);
}
