/**
 * Snapshot Storage — the persistence contract and its in-memory backend.
 *
 * ProjectDatabase (IndexedDB) implements the same interface in the browser;
 * MemorySnapshotStorage covers environments without IndexedDB and tests.
 * Everything read back is untrusted until it passes the guards below.
 */

import type { BlockKind, ProjectSnapshot } from '../engine/graph/models';
import { PROJECT_INFO_FIELDS, isTextField } from '../engine/graph/projectInfo';

// ─── Records ───

export interface SnapshotRecord {
    id: string;
    version: number;
    timestamp: number;
    label: string;
    data: ProjectSnapshot;
    sizeBytes: number;
}

export type MetaValue = string | number;

export interface SnapshotStorage {
    saveCurrent(snapshot: ProjectSnapshot): Promise<void>;
    /** Raw stored value; validate with isProjectSnapshot */
    loadCurrent(): Promise<unknown>;

    saveSnapshot(record: SnapshotRecord): Promise<void>;
    getSnapshot(id: string): Promise<SnapshotRecord | undefined>;
    /** Newest first */
    listSnapshots(): Promise<SnapshotRecord[]>;
    deleteSnapshot(id: string): Promise<void>;
    /** Keep the newest `keepCount` snapshots; returns how many were deleted */
    pruneSnapshots(keepCount: number): Promise<number>;

    setMeta(key: string, value: MetaValue): Promise<void>;
    getMeta(key: string): Promise<MetaValue | undefined>;
}

// ─── Guards ───

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

function isPosition(value: unknown): boolean {
    return value === null || (isRecord(value) && isFiniteNumber(value.x) && isFiniteNumber(value.y));
}

/** Fields each block kind carries beyond id, parent, name and position */
const KIND_FIELDS: Record<BlockKind, (b: Record<string, unknown>) => boolean> = {
    location: () => true,
    supply: (b) => isFiniteNumber(b.voltageV) && isFiniteNumber(b.impedanceOhm),
    alternator: (b) => isNullableString(b.equipmentId),
    conductor: (b) => isFiniteNumber(b.lengthM) && isNullableString(b.equipmentId),
    busbar: () => true,
    transformerUps: (b) => isNullableString(b.equipmentId),
    load: (b) => isNullableString(b.equipmentId),
    externalBusbar: () => true,
    row: (b) =>
        (b.protection === 'circuitBreaker' || b.protection === 'pin') &&
        (b.ratingA === null || isFiniteNumber(b.ratingA)),
};

function isBlockKind(value: unknown): value is BlockKind {
    return typeof value === 'string' && Object.hasOwn(KIND_FIELDS, value);
}

function isBlock(value: unknown): boolean {
    if (!isRecord(value) || !isBlockKind(value.kind)) return false;
    if (!isFiniteNumber(value.id) || !isFiniteNumber(value.parentId) || typeof value.name !== 'string') {
        return false;
    }
    if (value.kind !== 'row' && !isPosition(value.renderPosition)) return false;
    return KIND_FIELDS[value.kind](value);
}

function isProjectInfo(value: unknown): boolean {
    if (!isRecord(value)) return false;
    return PROJECT_INFO_FIELDS.every((field) =>
        isTextField(field) ? typeof value[field] === 'string' : isFiniteNumber(value[field]),
    );
}

/**
 * Shape check of every block, terminal and connection; referential
 * integrity is checked by the project store when the snapshot is loaded.
 */
export function isProjectSnapshot(value: unknown): value is ProjectSnapshot {
    if (!isRecord(value)) return false;
    if (typeof value.name !== 'string' || !isProjectInfo(value.info)) return false;
    if (!isFiniteNumber(value.nextId) || !isFiniteNumber(value.version)) return false;
    if (!Array.isArray(value.blocks) || !Array.isArray(value.terminals) || !Array.isArray(value.connections)) {
        return false;
    }

    const terminalsOk = value.terminals.every(
        (t) =>
            isRecord(t) &&
            isFiniteNumber(t.id) &&
            isFiniteNumber(t.blockId) &&
            isFiniteNumber(t.side) &&
            typeof t.name === 'string',
    );
    const connectionsOk = value.connections.every(
        (c) => isRecord(c) && isFiniteNumber(c.leftId) && isFiniteNumber(c.rightId),
    );
    return value.blocks.every(isBlock) && terminalsOk && connectionsOk;
}

export function isSnapshotRecord(value: unknown): value is SnapshotRecord {
    return (
        isRecord(value) &&
        typeof value.id === 'string' &&
        isFiniteNumber(value.version) &&
        isFiniteNumber(value.timestamp) &&
        typeof value.label === 'string' &&
        isFiniteNumber(value.sizeBytes) &&
        isProjectSnapshot(value.data)
    );
}

export function isMetaValue(value: unknown): value is MetaValue {
    return typeof value === 'string' || isFiniteNumber(value);
}

// ─── In-memory backend ───

export class MemorySnapshotStorage implements SnapshotStorage {
    private current: ProjectSnapshot | undefined;
    private snapshots = new Map<string, SnapshotRecord>();
    private meta = new Map<string, MetaValue>();

    async saveCurrent(snapshot: ProjectSnapshot): Promise<void> {
        this.current = structuredClone(snapshot);
    }

    async loadCurrent(): Promise<unknown> {
        return this.current === undefined ? undefined : structuredClone(this.current);
    }

    async saveSnapshot(record: SnapshotRecord): Promise<void> {
        this.snapshots.set(record.id, structuredClone(record));
    }

    async getSnapshot(id: string): Promise<SnapshotRecord | undefined> {
        const record = this.snapshots.get(id);
        return record && structuredClone(record);
    }

    async listSnapshots(): Promise<SnapshotRecord[]> {
        return [...this.snapshots.values()].sort((a, b) => b.timestamp - a.timestamp);
    }

    async deleteSnapshot(id: string): Promise<void> {
        this.snapshots.delete(id);
    }

    async pruneSnapshots(keepCount: number): Promise<number> {
        const toDelete = (await this.listSnapshots()).slice(keepCount);
        for (const record of toDelete) this.snapshots.delete(record.id);
        return toDelete.length;
    }

    async setMeta(key: string, value: MetaValue): Promise<void> {
        this.meta.set(key, value);
    }

    async getMeta(key: string): Promise<MetaValue | undefined> {
        return this.meta.get(key);
    }
}
