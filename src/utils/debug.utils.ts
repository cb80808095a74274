import * as inspector from 'inspector';

/**
 * True while the Node inspector is open, e.g. under --inspect or when a
 * debugger attached through SIGUSR1.
 */
export function isDebuggerAttached(): boolean {
    return inspector.url() !== undefined;
}
