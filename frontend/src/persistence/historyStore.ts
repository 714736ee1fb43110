/**
 * History Store — the saved snapshot list shown in the history panel.
 *
 * Reads through the PersistenceManager attached at start-up; without one
 * every action is a no-op.
 */

import { create } from 'zustand';

import type { PersistenceManager } from './PersistenceManager';
import type { SnapshotRecord } from './storage';

export interface HistoryEntry {
    id: string;
    label: string;
    version: number;
    timestamp: number;
    sizeBytes: number;
    blockCount: number;
}

interface HistoryState {
    /** Newest first */
    entries: HistoryEntry[];
    lastSaveTime: number | null;
}

interface HistoryActions {
    attach: (manager: PersistenceManager | null) => void;
    refresh: () => Promise<void>;
    restore: (id: string) => Promise<boolean>;
    remove: (id: string) => Promise<void>;
    reset: () => void;
}

export type HistoryStore = HistoryState & HistoryActions;

const initialState: HistoryState = {
    entries: [],
    lastSaveTime: null,
};

let manager: PersistenceManager | null = null;

function toEntry(record: SnapshotRecord): HistoryEntry {
    return {
        id: record.id,
        label: record.label,
        version: record.version,
        timestamp: record.timestamp,
        sizeBytes: record.sizeBytes,
        blockCount: record.data.blocks.length,
    };
}

export const useHistoryStore = create<HistoryStore>((set, get) => ({
    ...initialState,

    attach: (next) => {
        manager = next;
        set(initialState);
    },

    refresh: async () => {
        if (!manager) return;
        const [records, lastSaveTime] = await Promise.all([manager.listSnapshots(), manager.getLastSaveTime()]);
        set({ entries: records.map(toEntry), lastSaveTime });
    },

    restore: async (id) => {
        if (!manager) return false;
        const restored = await manager.restoreSnapshot(id);
        if (restored) {
            const entry = get().entries.find((e) => e.id === id);
            console.info(`[Persistence] Restored "${entry?.label ?? id}"`);
        }
        return restored;
    },

    remove: async (id) => {
        if (!manager) return;
        await manager.deleteSnapshot(id);
        await get().refresh();
    },

    reset: () => {
        manager = null;
        set(initialState);
    },
}));
