/**
 * ProjectDatabase — SnapshotStorage on raw IndexedDB.
 *
 * Object stores:
 *   - "state"     : the current project, under a single key
 *   - "snapshots" : versioned snapshot records, indexed by timestamp
 *   - "meta"      : { key, value } pairs (last save time)
 *
 * Values read back are untyped; they pass the storage guards before use.
 */

import type { ProjectSnapshot } from '../engine/graph/models';
import type { MetaValue, SnapshotRecord, SnapshotStorage } from './storage';
import { isMetaValue, isSnapshotRecord } from './storage';

const DB_NAME = 'powerline-layout';
const DB_VERSION = 1;

const STORE_STATE = 'state';
const STORE_SNAPSHOTS = 'snapshots';
const STORE_META = 'meta';

const KEY_CURRENT = 'current_project';

function upgrade(db: IDBDatabase): void {
    if (!db.objectStoreNames.contains(STORE_STATE)) {
        db.createObjectStore(STORE_STATE);
    }
    if (!db.objectStoreNames.contains(STORE_SNAPSHOTS)) {
        const snapshots = db.createObjectStore(STORE_SNAPSHOTS, { keyPath: 'id' });
        snapshots.createIndex('timestamp', 'timestamp', { unique: false });
    }
    if (!db.objectStoreNames.contains(STORE_META)) {
        db.createObjectStore(STORE_META, { keyPath: 'key' });
    }
}

function readMetaValue(record: unknown): MetaValue | undefined {
    if (typeof record !== 'object' || record === null || !('value' in record)) return undefined;
    return isMetaValue(record.value) ? record.value : undefined;
}

export class ProjectDatabase implements SnapshotStorage {
    private connection: Promise<IDBDatabase> | null = null;

    private open(): Promise<IDBDatabase> {
        if (!this.connection) {
            this.connection = new Promise<IDBDatabase>((resolve, reject) => {
                const request = indexedDB.open(DB_NAME, DB_VERSION);
                request.onupgradeneeded = () => upgrade(request.result);
                request.onsuccess = () => resolve(request.result);
                request.onerror = () => {
                    this.connection = null;
                    reject(new Error(`Failed to open IndexedDB: ${request.error?.message ?? 'unknown error'}`));
                };
            });
        }
        return this.connection;
    }

    /** Run writes in one transaction; resolves once it commits */
    private async write(stores: string | string[], work: (tx: IDBTransaction) => void): Promise<void> {
        const db = await this.open();
        return new Promise((resolve, reject) => {
            const tx = db.transaction(stores, 'readwrite');
            work(tx);
            tx.oncomplete = () => resolve();
            tx.onerror = () => reject(tx.error);
            tx.onabort = () => reject(tx.error);
        });
    }

    /** Single read; resolves with the raw result */
    private async read(store: string, query: (s: IDBObjectStore) => IDBRequest): Promise<unknown> {
        const db = await this.open();
        return new Promise((resolve, reject) => {
            const request = query(db.transaction(store, 'readonly').objectStore(store));
            request.onsuccess = () => resolve(request.result);
            request.onerror = () => reject(request.error);
        });
    }

    // ─── Current project ───

    saveCurrent(snapshot: ProjectSnapshot): Promise<void> {
        return this.write(STORE_STATE, (tx) => {
            tx.objectStore(STORE_STATE).put(snapshot, KEY_CURRENT);
        });
    }

    loadCurrent(): Promise<unknown> {
        return this.read(STORE_STATE, (s) => s.get(KEY_CURRENT));
    }

    // ─── Snapshots ───

    saveSnapshot(record: SnapshotRecord): Promise<void> {
        return this.write(STORE_SNAPSHOTS, (tx) => {
            tx.objectStore(STORE_SNAPSHOTS).put(record);
        });
    }

    async getSnapshot(id: string): Promise<SnapshotRecord | undefined> {
        const value = await this.read(STORE_SNAPSHOTS, (s) => s.get(id));
        return isSnapshotRecord(value) ? value : undefined;
    }

    async listSnapshots(): Promise<SnapshotRecord[]> {
        const values = await this.read(STORE_SNAPSHOTS, (s) => s.index('timestamp').getAll());
        if (!Array.isArray(values)) return [];
        // index order is oldest first
        return values.filter(isSnapshotRecord).reverse();
    }

    deleteSnapshot(id: string): Promise<void> {
        return this.write(STORE_SNAPSHOTS, (tx) => {
            tx.objectStore(STORE_SNAPSHOTS).delete(id);
        });
    }

    async pruneSnapshots(keepCount: number): Promise<number> {
        const stale = (await this.listSnapshots()).slice(keepCount);
        if (stale.length === 0) return 0;

        await this.write(STORE_SNAPSHOTS, (tx) => {
            const store = tx.objectStore(STORE_SNAPSHOTS);
            for (const record of stale) store.delete(record.id);
        });
        return stale.length;
    }

    // ─── Meta ───

    setMeta(key: string, value: MetaValue): Promise<void> {
        return this.write(STORE_META, (tx) => {
            tx.objectStore(STORE_META).put({ key, value });
        });
    }

    async getMeta(key: string): Promise<MetaValue | undefined> {
        return readMetaValue(await this.read(STORE_META, (s) => s.get(key)));
    }
}

// ─── Singleton ───

let instance: ProjectDatabase | null = null;

export function getDatabase(): ProjectDatabase {
    if (!instance) {
        instance = new ProjectDatabase();
    }
    return instance;
}
