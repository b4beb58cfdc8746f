/**
 * Console output for goldspan commands.
 *
 * With `--output json`, `evaluate` and `compare` print a single JSON document
 * on stdout, so they switch silent mode on and progress lines such as
 * "Evaluating model_x..." are dropped. Errors go to stderr either way.
 */

let silentMode = false;

export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(...args);
    }
}

export function error(...args: unknown[]): void {
    console.error(...args);
}
