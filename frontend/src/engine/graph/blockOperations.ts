/**
 * Block Operations — pure helpers that build and tear down blocks.
 *
 * All functions operate on a ProjectState (or an Immer draft of one)
 * and never touch the store directly.
 */

import type {
    Block,
    BlockKind,
    ProjectState,
    RowProtection,
    Terminal,
} from './models';
import { ROOT_PARENT_ID } from './models';
import { InvalidBlockError, NotFoundError } from './errors';

// ─── Kind tables ───

export const KIND_LABELS: Record<BlockKind, string> = {
    location: 'Location',
    supply: 'Supply',
    alternator: 'Alternator',
    conductor: 'Conductor',
    busbar: 'Busbar',
    transformerUps: 'Transformer/UPS',
    load: 'Load',
    externalBusbar: 'External Busbar',
    row: 'Row',
};

/** Kind a parent must have; null for root blocks */
export const PARENT_KIND: Record<BlockKind, BlockKind | null> = {
    location: null,
    supply: null,
    alternator: null,
    conductor: null,
    busbar: 'location',
    transformerUps: 'location',
    load: 'location',
    externalBusbar: 'location',
    row: 'busbar',
};

export const TERMINAL_NAMES: Record<BlockKind, readonly string[]> = {
    location: ['T1', 'T2', 'T3', 'T4', 'T5', 'T6', 'T7', 'T8'],
    supply: ['Output'],
    alternator: ['Output'],
    conductor: ['A', 'B'],
    busbar: [],
    transformerUps: ['Primary', 'Secondary'],
    load: ['Input'],
    externalBusbar: ['EB1', 'EB2', 'EB3', 'EB4', 'EB5', 'EB6', 'EB7', 'EB8'],
    row: ['Line', 'Load'],
};

export const MAX_NAME_LENGTH = 50;
const DEFAULT_SUPPLY_VOLTAGE = 230;
const DEFAULT_SUPPLY_IMPEDANCE = 1.6;

// ─── Validation ───

/** Returns the trimmed name or throws InvalidBlockError */
export function validateName(name: string): string {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
        throw new InvalidBlockError('Name cannot be empty');
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
        throw new InvalidBlockError(`Name cannot exceed ${MAX_NAME_LENGTH} characters`);
    }
    return trimmed;
}

function validateRating(ratingA: number): number {
    if (!Number.isInteger(ratingA) || ratingA < 0) {
        throw new InvalidBlockError('Rating must be a non-negative whole number of amperes');
    }
    return ratingA;
}

/**
 * Check that a block of `kind` may be created under `parentId`.
 * Throws NotFoundError / InvalidBlockError; returns nothing on success.
 */
export function assertCanAdd(state: ProjectState, kind: BlockKind, parentId: number): void {
    if (kind === 'externalBusbar') {
        throw new InvalidBlockError('External busbars are created with their location');
    }

    const required = PARENT_KIND[kind];
    if (required === null) {
        if (parentId !== ROOT_PARENT_ID) {
            throw new InvalidBlockError(`${KIND_LABELS[kind]} must be placed at the top level`);
        }
        return;
    }

    const parent = state.blocks[parentId];
    if (!parent) throw new NotFoundError('Block', parentId);
    if (parent.kind !== required) {
        throw new InvalidBlockError(
            `${KIND_LABELS[kind]} must be placed in a ${KIND_LABELS[required]}`,
        );
    }
}

// ─── Naming ───

function defaultName(state: ProjectState, kind: BlockKind, parentId: number): string {
    if (kind === 'externalBusbar') return KIND_LABELS.externalBusbar;

    const scoped = PARENT_KIND[kind] !== null;
    let count = 0;
    for (const block of Object.values(state.blocks)) {
        if (block.kind !== kind) continue;
        if (scoped && block.parentId !== parentId) continue;
        count++;
    }
    return `${KIND_LABELS[kind]} ${count + 1}`;
}

// ─── Construction ───

function createBlock(kind: BlockKind, id: number, parentId: number, name: string): Block {
    const base = { id, parentId, name };
    switch (kind) {
        case 'location':
        case 'busbar':
        case 'externalBusbar':
            return { ...base, kind, renderPosition: null };
        case 'supply':
            return {
                ...base,
                kind,
                renderPosition: null,
                voltageV: DEFAULT_SUPPLY_VOLTAGE,
                impedanceOhm: DEFAULT_SUPPLY_IMPEDANCE,
            };
        case 'conductor':
            return { ...base, kind, renderPosition: null, lengthM: 0, equipmentId: null };
        case 'alternator':
        case 'transformerUps':
        case 'load':
            return { ...base, kind, renderPosition: null, equipmentId: null };
        case 'row':
            return { ...base, kind, protection: 'circuitBreaker', ratingA: 0 };
    }
}

function attachTerminals(draft: ProjectState, block: Block): Terminal[] {
    const terminals = TERMINAL_NAMES[block.kind].map((name, side) => ({
        id: draft.nextId++,
        blockId: block.id,
        side,
        name,
    }));
    for (const t of terminals) draft.terminals[t.id] = t;
    return terminals;
}

/**
 * Insert a block with its terminal set. A location also receives its
 * external busbar, with location terminal i wired to busbar terminal i.
 * Caller must have run assertCanAdd. Returns the new block id.
 */
export function insertBlock(draft: ProjectState, kind: BlockKind, parentId: number): number {
    const block = createBlock(kind, draft.nextId++, parentId, defaultName(draft, kind, parentId));
    draft.blocks[block.id] = block;
    const terminals = attachTerminals(draft, block);

    if (block.kind === 'location') {
        const eb = createBlock('externalBusbar', draft.nextId++, block.id, KIND_LABELS.externalBusbar);
        draft.blocks[eb.id] = eb;
        const ebTerminals = attachTerminals(draft, eb);
        terminals.forEach((t, i) => {
            draft.connections.push({ leftId: t.id, rightId: ebTerminals[i].id });
        });
        draft.connectionVersion++;
    }

    return block.id;
}

// ─── Removal ───

/** Ids of the block and every descendant, parents first */
function collectSubtree(state: ProjectState, rootId: number): number[] {
    const ids = [rootId];
    for (let i = 0; i < ids.length; i++) {
        const current = ids[i];
        for (const block of Object.values(state.blocks)) {
            if (block.parentId === current) ids.push(block.id);
        }
    }
    return ids;
}

/**
 * Remove a block subtree, its terminals and every connection touching
 * one of those terminals. Returns the number of connections dropped.
 */
export function removeSubtree(draft: ProjectState, rootId: number): number {
    const blockIds = new Set(collectSubtree(draft, rootId));
    const terminalIds = new Set<number>();

    for (const terminal of Object.values(draft.terminals)) {
        if (blockIds.has(terminal.blockId)) terminalIds.add(terminal.id);
    }

    const before = draft.connections.length;
    draft.connections = draft.connections.filter(
        (c) => !terminalIds.has(c.leftId) && !terminalIds.has(c.rightId),
    );

    for (const id of terminalIds) delete draft.terminals[id];
    for (const id of blockIds) delete draft.blocks[id];

    return before - draft.connections.length;
}

// ─── Row protection ───

export function resolveRowProtection(
    protection: RowProtection,
    ratingA: number | null,
): { protection: RowProtection; ratingA: number | null } {
    if (protection === 'pin') return { protection, ratingA: null };
    return { protection, ratingA: validateRating(ratingA ?? 0) };
}
