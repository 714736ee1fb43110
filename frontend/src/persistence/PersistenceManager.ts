/**
 * PersistenceManager — auto-save, labelled snapshots and restore for one project.
 *
 * Writes go to a SnapshotStorage: IndexedDB in the browser, memory elsewhere.
 * A save is skipped when the project version has not moved since the last
 * save or restore, and saves never overlap.
 *
 * No React dependency. Pure TypeScript.
 */

import type { ProjectSnapshot } from '../engine/graph/models';
import type { SnapshotRecord, SnapshotStorage } from './storage';
import { MemorySnapshotStorage, isProjectSnapshot } from './storage';
import { getDatabase } from './db';

// ─── Config ───

export interface PersistenceConfig {
    /** Auto-save interval in milliseconds (default: 10000) */
    autoSaveIntervalMs: number;
    /** Snapshot records kept after each save (default: 50) */
    maxSnapshots: number;
    autoSaveEnabled: boolean;
    onSave?: (version: number, durationMs: number) => void;
    /** Save and restore failures; the manager itself never throws them */
    onError?: (error: Error) => void;
    onRestore?: (version: number) => void;
}

const DEFAULT_CONFIG: PersistenceConfig = {
    autoSaveIntervalMs: 10_000,
    maxSnapshots: 50,
    autoSaveEnabled: true,
};

const KEY_LAST_SAVE = 'last_save_timestamp';

/** The store side of persistence; loadSnapshot throws on an inconsistent snapshot */
export interface PersistenceTarget {
    getSnapshot(): ProjectSnapshot;
    loadSnapshot(snapshot: ProjectSnapshot): void;
}

function toSnapshotRecord(snapshot: ProjectSnapshot, label: string | undefined, timestamp: number): SnapshotRecord {
    return {
        id: `snap_${snapshot.version}_${timestamp}`,
        version: snapshot.version,
        timestamp,
        label: label ?? `Auto-save v${snapshot.version}`,
        data: snapshot,
        sizeBytes: new Blob([JSON.stringify(snapshot)]).size,
    };
}

// ─── Manager ───

export class PersistenceManager {
    private readonly config: PersistenceConfig;
    private target: PersistenceTarget | null = null;
    private timer: ReturnType<typeof setInterval> | null = null;
    private lastSavedVersion = -1;
    private inFlight: Promise<boolean> | null = null;

    constructor(
        private readonly storage: SnapshotStorage,
        config: Partial<PersistenceConfig> = {},
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    bind(target: PersistenceTarget): void {
        this.target = target;
    }

    // ─── Auto-Save ───

    startAutoSave(): void {
        if (this.timer || !this.config.autoSaveEnabled) return;
        this.timer = setInterval(() => {
            this.save().catch((err: unknown) => this.report(err));
        }, this.config.autoSaveIntervalMs);
    }

    stopAutoSave(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
    }

    // ─── Save ───

    /** Resolves true when a new version was written; failures go to onError */
    async save(label?: string): Promise<boolean> {
        // Wait out a running save so both see the same lastSavedVersion
        if (this.inFlight) await this.inFlight;

        const run = this.write(label);
        this.inFlight = run;
        try {
            return await run;
        } finally {
            if (this.inFlight === run) this.inFlight = null;
        }
    }

    saveManual(label: string): Promise<boolean> {
        return this.save(label);
    }

    private async write(label: string | undefined): Promise<boolean> {
        if (!this.target) return false;

        const start = performance.now();
        const snapshot = this.target.getSnapshot();
        if (snapshot.version === this.lastSavedVersion) return false;

        try {
            const timestamp = Date.now();
            await this.storage.saveCurrent(snapshot);
            await this.storage.setMeta(KEY_LAST_SAVE, timestamp);
            await this.storage.saveSnapshot(toSnapshotRecord(snapshot, label, timestamp));
            await this.storage.pruneSnapshots(this.config.maxSnapshots);
        } catch (err) {
            this.report(err);
            return false;
        }

        this.lastSavedVersion = snapshot.version;
        this.config.onSave?.(snapshot.version, performance.now() - start);
        return true;
    }

    // ─── Restore ───

    /** Load the last saved project; false when nothing valid was stored */
    async restore(): Promise<boolean> {
        try {
            const stored = await this.storage.loadCurrent();
            if (stored === undefined) return false;
            if (!isProjectSnapshot(stored)) {
                throw new Error('Stored project is not a valid snapshot');
            }
            return this.apply(stored);
        } catch (err) {
            this.report(err);
            return false;
        }
    }

    /** Load a history entry and make it the stored current project */
    async restoreSnapshot(snapshotId: string): Promise<boolean> {
        try {
            const record = await this.storage.getSnapshot(snapshotId);
            if (!record || !this.apply(record.data)) return false;
            await this.storage.saveCurrent(record.data);
            return true;
        } catch (err) {
            this.report(err);
            return false;
        }
    }

    private apply(snapshot: ProjectSnapshot): boolean {
        if (!this.target) return false;
        this.target.loadSnapshot(snapshot);
        this.lastSavedVersion = snapshot.version;
        this.config.onRestore?.(snapshot.version);
        return true;
    }

    private report(err: unknown): void {
        this.config.onError?.(err instanceof Error ? err : new Error(String(err)));
    }

    // ─── Snapshot Management ───

    listSnapshots(): Promise<SnapshotRecord[]> {
        return this.storage.listSnapshots();
    }

    deleteSnapshot(id: string): Promise<void> {
        return this.storage.deleteSnapshot(id);
    }

    async getLastSaveTime(): Promise<number | null> {
        const value = await this.storage.getMeta(KEY_LAST_SAVE);
        return typeof value === 'number' ? value : null;
    }

    // ─── Lifecycle ───

    destroy(): void {
        this.stopAutoSave();
        this.target = null;
    }
}

// ─── Singleton ───

let instance: PersistenceManager | null = null;

/** Falls back to memory-only storage where IndexedDB is unavailable */
export function getPersistenceManager(config?: Partial<PersistenceConfig>): PersistenceManager {
    if (!instance) {
        let storage: SnapshotStorage;
        if (typeof indexedDB === 'undefined') {
            console.warn('[Persistence] IndexedDB unavailable, changes will not survive a reload');
            storage = new MemorySnapshotStorage();
        } else {
            storage = getDatabase();
        }
        instance = new PersistenceManager(storage, config);
    }
    return instance;
}
