/**
 * Project Graph Store — Zustand + Immer
 *
 * Owns the block forest, terminal table and connection set of the open
 * project. Every failing mutation throws a DiagramError before touching
 * state, so the graph is never left half-updated.
 */

import { create } from 'zustand';
import { produce } from 'immer';

import type {
    Block,
    BlockKind,
    Connection,
    ConnectionCheckResult,
    LogicalPoint,
    ProjectSnapshot,
    ProjectState,
    RowBlock,
    RowProtection,
    Terminal,
} from './models';
import { ROOT_PARENT_ID, isEquipmentBlock, isSameConnection } from './models';

import {
    PARENT_KIND,
    assertCanAdd,
    insertBlock,
    removeSubtree,
    resolveRowProtection,
    validateName,
} from './blockOperations';
import { checkConnection } from './connectionValidation';
import { DEFAULT_PROJECT_INFO, validateProjectInfo } from './projectInfo';
import type { ProjectInfo } from './projectInfo';
import { createGraphReader } from './queries';
import type { GraphReader } from './queries';
import {
    InvalidBlockError,
    InvalidConnectionError,
    NotFoundError,
} from './errors';

// ─── Store Actions ───

interface ProjectActions {
    // ─── Queries ───
    reader(): GraphReader;
    getBlock(id: number): Block;
    getAllBlocks(): Block[];
    getChildren(parentId: number): Block[];
    getRows(busbarId: number): RowBlock[];
    getTerminal(id: number): Terminal;
    getTerminals(blockId: number): Terminal[];
    getConnections(terminalId: number): Connection[];

    // ─── Block CRUD ───
    /** Create a block (with its terminals) and return its id */
    addBlock(kind: BlockKind, parentId?: number): number;
    /** Remove a block, its descendants, their terminals and connections */
    removeBlock(id: number): void;
    renameBlock(id: number, name: string): void;
    setRenderPosition(id: number, position: LogicalPoint): void;
    setRowProtection(rowId: number, protection: RowProtection, ratingA?: number | null): void;
    setSupplyRatings(id: number, voltageV: number, impedanceOhm: number): void;
    setConductorLength(id: number, lengthM: number): void;
    assignEquipment(id: number, equipmentId: string | null): void;

    // ─── Connection ───
    canConnect(terminalA: number, terminalB: number): ConnectionCheckResult;
    addConnection(terminalA: number, terminalB: number): void;
    removeConnection(terminalA: number, terminalB: number): void;

    // ─── Snapshot ───
    getSnapshot(): ProjectSnapshot;
    loadSnapshot(snapshot: ProjectSnapshot): void;
    setProjectName(name: string): void;
    setProjectInfo(patch: Partial<ProjectInfo>): void;
    markSaved(): void;
    /** Replace the project with an empty one; versions keep counting up */
    newProject(): void;
    reset(): void;
}

export type ProjectStore = ProjectState & ProjectActions;

// ─── Initial State ───

export const initialProjectState: ProjectState = {
    name: 'Untitled Project',
    info: DEFAULT_PROJECT_INFO,
    blocks: {},
    terminals: {},
    connections: [],
    nextId: 1,
    version: 0,
    structureVersion: 0,
    connectionVersion: 0,
    isModified: false,
};

// ─── Store ───

export const useProjectStore = create<ProjectStore>((set, get) => ({
    ...initialProjectState,

    // ─── Queries ───

    reader: () => createGraphReader(get()),
    getBlock: (id) => createGraphReader(get()).getBlock(id),
    getAllBlocks: () => createGraphReader(get()).getAllBlocks(),
    getChildren: (parentId) => createGraphReader(get()).getChildren(parentId),
    getRows: (busbarId) => createGraphReader(get()).getRows(busbarId),
    getTerminal: (id) => createGraphReader(get()).getTerminal(id),
    getTerminals: (blockId) => createGraphReader(get()).getTerminals(blockId),
    getConnections: (terminalId) => createGraphReader(get()).getConnections(terminalId),

    // ─── Block CRUD ───

    addBlock: (kind, parentId = ROOT_PARENT_ID) => {
        assertCanAdd(get(), kind, parentId);
        const id = get().nextId;

        set(
            produce((draft: ProjectState) => {
                insertBlock(draft, kind, parentId);
                draft.structureVersion++;
                touch(draft);
            }),
        );

        return id;
    },

    removeBlock: (id) => {
        const block = get().getBlock(id);
        if (block.kind === 'externalBusbar') {
            throw new InvalidBlockError('An external busbar is removed with its location');
        }

        set(
            produce((draft: ProjectState) => {
                const dropped = removeSubtree(draft, id);
                if (dropped > 0) draft.connectionVersion++;
                draft.structureVersion++;
                touch(draft);
            }),
        );
    },

    renameBlock: (id, name) => {
        get().getBlock(id);
        const trimmed = validateName(name);

        set(
            produce((draft: ProjectState) => {
                draft.blocks[id].name = trimmed;
                touch(draft);
            }),
        );
    },

    setRenderPosition: (id, position) => {
        const block = get().getBlock(id);
        if (block.kind === 'row') {
            throw new InvalidBlockError('Rows are positioned by their busbar');
        }
        if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
            throw new InvalidBlockError('Position must be finite');
        }
        const rounded = { x: Math.round(position.x) || 0, y: Math.round(position.y) || 0 };

        set(
            produce((draft: ProjectState) => {
                const target = draft.blocks[id];
                if (target.kind === 'row') return;
                target.renderPosition = rounded;
                touch(draft);
            }),
        );
    },

    setRowProtection: (rowId, protection, ratingA = null) => {
        const block = get().getBlock(rowId);
        if (block.kind !== 'row') {
            throw new InvalidBlockError(`Block ${rowId} is not a busbar row`);
        }
        const resolved = resolveRowProtection(protection, ratingA);

        set(
            produce((draft: ProjectState) => {
                const row = draft.blocks[rowId];
                if (row.kind !== 'row') return;
                row.protection = resolved.protection;
                row.ratingA = resolved.ratingA;
                touch(draft);
            }),
        );
    },

    setSupplyRatings: (id, voltageV, impedanceOhm) => {
        const block = get().getBlock(id);
        if (block.kind !== 'supply') {
            throw new InvalidBlockError(`Block ${id} is not a supply`);
        }
        if (!Number.isInteger(voltageV) || voltageV <= 0) {
            throw new InvalidBlockError('Voltage must be a positive whole number');
        }
        if (!Number.isFinite(impedanceOhm) || impedanceOhm < 0) {
            throw new InvalidBlockError('Impedance must be zero or positive');
        }

        set(
            produce((draft: ProjectState) => {
                const supply = draft.blocks[id];
                if (supply.kind !== 'supply') return;
                supply.voltageV = voltageV;
                supply.impedanceOhm = impedanceOhm;
                touch(draft);
            }),
        );
    },

    setConductorLength: (id, lengthM) => {
        const block = get().getBlock(id);
        if (block.kind !== 'conductor') {
            throw new InvalidBlockError(`Block ${id} is not a conductor`);
        }
        if (!Number.isFinite(lengthM) || lengthM < 0) {
            throw new InvalidBlockError('Length must be zero or positive');
        }

        set(
            produce((draft: ProjectState) => {
                const conductor = draft.blocks[id];
                if (conductor.kind !== 'conductor') return;
                conductor.lengthM = lengthM;
                touch(draft);
            }),
        );
    },

    assignEquipment: (id, equipmentId) => {
        const block = get().getBlock(id);
        if (!isEquipmentBlock(block)) {
            throw new InvalidBlockError(`Block ${id} does not take catalog equipment`);
        }

        set(
            produce((draft: ProjectState) => {
                const target = draft.blocks[id];
                if (!isEquipmentBlock(target)) return;
                target.equipmentId = equipmentId;
                touch(draft);
            }),
        );
    },

    // ─── Connection ───

    canConnect: (terminalA, terminalB) => checkConnection(get(), terminalA, terminalB),

    addConnection: (terminalA, terminalB) => {
        const check = get().canConnect(terminalA, terminalB);
        if (!check.allowed) {
            throw new InvalidConnectionError(check.reason ?? 'Connection not allowed');
        }

        set(
            produce((draft: ProjectState) => {
                draft.connections.push({ leftId: terminalA, rightId: terminalB });
                draft.connectionVersion++;
                touch(draft);
            }),
        );
    },

    removeConnection: (terminalA, terminalB) => {
        const index = get().connections.findIndex((c) => isSameConnection(c, terminalA, terminalB));
        if (index < 0) {
            throw new NotFoundError('Connection from terminal', terminalA);
        }

        set(
            produce((draft: ProjectState) => {
                draft.connections.splice(index, 1);
                draft.connectionVersion++;
                touch(draft);
            }),
        );
    },

    // ─── Snapshot ───

    getSnapshot: () => {
        const s = get();
        return {
            name: s.name,
            info: { ...s.info },
            blocks: Object.values(s.blocks),
            terminals: Object.values(s.terminals),
            connections: [...s.connections],
            nextId: s.nextId,
            version: s.version,
        };
    },

    loadSnapshot: (snapshot) => {
        const nextId = validateSnapshot(snapshot);

        set(
            produce((draft: ProjectState) => {
                draft.name = snapshot.name;
                draft.info = { ...snapshot.info };
                draft.blocks = {};
                for (const b of snapshot.blocks) draft.blocks[b.id] = b;
                draft.terminals = {};
                for (const t of snapshot.terminals) draft.terminals[t.id] = t;
                draft.connections = [...snapshot.connections];
                draft.nextId = nextId;
                draft.version = snapshot.version;
                draft.structureVersion++;
                draft.connectionVersion++;
                draft.isModified = false;
            }),
        );
    },

    setProjectName: (name) => {
        const trimmed = validateName(name);
        set(
            produce((draft: ProjectState) => {
                draft.name = trimmed;
                touch(draft);
            }),
        );
    },

    setProjectInfo: (patch) => {
        const valid = validateProjectInfo(patch);
        set(
            produce((draft: ProjectState) => {
                Object.assign(draft.info, valid);
                touch(draft);
            }),
        );
    },

    markSaved: () => set({ isModified: false }),

    newProject: () => {
        const { version, structureVersion, connectionVersion } = get();
        set({
            ...initialProjectState,
            version: version + 1,
            structureVersion: structureVersion + 1,
            connectionVersion: connectionVersion + 1,
        });
        console.info('[Graph] Started a new project');
    },

    reset: () => set(initialProjectState),
}));

// ─── Helpers ───

function touch(draft: ProjectState): void {
    draft.version++;
    draft.isModified = true;
}

/**
 * Check referential integrity of a snapshot before it replaces the
 * current graph. Returns the id counter to resume from.
 */
function validateSnapshot(snapshot: ProjectSnapshot): number {
    validateProjectInfo(snapshot.info);
    const blocks = new Map(snapshot.blocks.map((b) => [b.id, b]));
    const terminalIds = new Set(snapshot.terminals.map((t) => t.id));
    let maxId = 0;

    for (const block of snapshot.blocks) {
        maxId = Math.max(maxId, block.id);
        const required = PARENT_KIND[block.kind];
        if (required === null) {
            if (block.parentId !== ROOT_PARENT_ID) {
                throw new InvalidBlockError(`Block ${block.id} must be a root block`);
            }
            continue;
        }
        const parent = blocks.get(block.parentId);
        if (!parent || parent.kind !== required) {
            throw new InvalidBlockError(`Block ${block.id} has an invalid parent ${block.parentId}`);
        }
    }

    for (const terminal of snapshot.terminals) {
        maxId = Math.max(maxId, terminal.id);
        if (!blocks.has(terminal.blockId)) {
            throw new InvalidBlockError(`Terminal ${terminal.id} belongs to missing block ${terminal.blockId}`);
        }
    }

    for (const c of snapshot.connections) {
        if (!terminalIds.has(c.leftId) || !terminalIds.has(c.rightId) || c.leftId === c.rightId) {
            throw new InvalidConnectionError(
                `Connection ${c.leftId}-${c.rightId} references missing terminals`,
            );
        }
    }

    return Math.max(snapshot.nextId, maxId + 1);
}
