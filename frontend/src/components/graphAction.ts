import { isDiagramError } from '../engine/graph';

/**
 * Run a user-triggered graph edit. Rejected edits leave the model unchanged
 * and are logged; anything that is not a DiagramError is a bug and propagates.
 */
export function runGraphAction(action: () => void): boolean {
    try {
        action();
        return true;
    } catch (err) {
        if (!isDiagramError(err)) throw err;
        console.warn(`[Graph] ${err.message}`);
        return false;
    }
}
