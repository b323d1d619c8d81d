/**
 * logging.ts
 *
 * Console logging helpers for code that runs outside a request (scripts,
 * start-up). Request handlers log through `app.log` instead. Debug output is
 * off until `setDebugLogging` turns it on from the `LOG_DEBUG` setting.
 */

let debugEnabled = false;

export function setDebugLogging(enabled: boolean) {
    debugEnabled = enabled;
}

export function debug(...args: unknown[]) {
    if (debugEnabled) {
        console.log(...args);
    }
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
