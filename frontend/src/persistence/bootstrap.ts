/**
 * Bootstrap — App startup persistence integration.
 *
 * Call `initPersistence()` once during app initialization (main.tsx).
 *
 * It will:
 * 1. Restore the last saved project (if any)
 * 2. Start the auto-save interval
 * 3. Save when the page is hidden or closed
 * 4. Keep the history panel's snapshot list current
 */

import { useProjectStore } from '../engine/graph/projectStore';
import { getEditorConfig } from '../config/editorConfig';
import { getPersistenceManager } from './PersistenceManager';
import type { PersistenceConfig } from './PersistenceManager';
import { useHistoryStore } from './historyStore';

let initialized = false;

function reportSaveError(err: unknown): void {
    console.warn('[Persistence] Save failed:', err);
}

function refreshHistory(): void {
    useHistoryStore
        .getState()
        .refresh()
        .catch((err: unknown) => console.warn('[Persistence] Could not read snapshot history:', err));
}

export async function initPersistence(
    config?: Partial<PersistenceConfig>,
): Promise<{ restored: boolean; version: number | null }> {
    if (initialized) {
        return { restored: false, version: null };
    }

    const manager = getPersistenceManager({
        autoSaveIntervalMs: getEditorConfig().autoSaveIntervalMs,
        onSave: (version, durationMs) => {
            // Nothing edited since the snapshot was taken
            if (useProjectStore.getState().version === version) {
                useProjectStore.getState().markSaved();
            }
            console.info(`[Persistence] Saved v${version} in ${durationMs.toFixed(1)}ms`);
            refreshHistory();
        },
        onError: (err) => console.warn(`[Persistence] ${err.message}`),
        ...config,
    });

    manager.bind({
        getSnapshot: () => useProjectStore.getState().getSnapshot(),
        loadSnapshot: (snapshot) => useProjectStore.getState().loadSnapshot(snapshot),
    });

    useHistoryStore.getState().attach(manager);

    const restored = await manager.restore();
    const version = restored ? useProjectStore.getState().version : null;
    if (restored) {
        console.info(`[Persistence] Restored project v${version}`);
    } else {
        console.info('[Persistence] No saved project found, starting fresh');
    }

    refreshHistory();
    manager.startAutoSave();

    // IndexedDB transactions may not finish during unload; visibilitychange is the reliable path
    window.addEventListener('beforeunload', () => {
        manager.save().catch(reportSaveError);
    });
    document.addEventListener('visibilitychange', () => {
        if (document.visibilityState === 'hidden') {
            manager.save().catch(reportSaveError);
        }
    });

    initialized = true;

    return { restored, version };
}

/**
 * Force a manual save with a custom label.
 * Use for explicit "Save" button clicks.
 */
export async function manualSave(label?: string): Promise<boolean> {
    const manager = getPersistenceManager();
    return manager.saveManual(label ?? `Manual save ${new Date().toLocaleTimeString()}`);
}
