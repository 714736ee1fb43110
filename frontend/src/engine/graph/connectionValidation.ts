/**
 * Connection Validation — checks connection legality.
 *
 * Rules:
 * 1. Both endpoints must be existing terminals
 * 2. A terminal cannot connect to itself
 * 3. The same pair cannot be connected twice (in either orientation)
 *
 * Cycles and parallel paths are allowed; electrical rules are not checked here.
 * Pure TypeScript. No React dependency.
 */

import type { ConnectionCheckResult, ProjectState } from './models';
import { isSameConnection } from './models';

export function checkConnection(
    state: ProjectState,
    terminalA: number,
    terminalB: number,
): ConnectionCheckResult {
    if (terminalA === terminalB) {
        return { allowed: false, reason: 'Cannot connect a terminal to itself' };
    }

    for (const id of [terminalA, terminalB]) {
        if (!state.terminals[id]) {
            return { allowed: false, reason: `Terminal ${id} does not exist` };
        }
    }

    if (state.connections.some((c) => isSameConnection(c, terminalA, terminalB))) {
        return { allowed: false, reason: 'These terminals are already connected' };
    }

    return { allowed: true, reason: null };
}
