/**
 * Power Layout Graph — Core Models
 *
 * Blocks, terminals and terminal-to-terminal connections of a single-line
 * power layout. Independent of any visual canvas representation.
 * Pure TypeScript. No React dependency.
 */

import type { ProjectInfo } from './projectInfo';

/** Parent id of blocks that sit at the top of the forest */
export const ROOT_PARENT_ID = -1;

// ─── Block Kinds ───

export type RootBlockKind = 'location' | 'supply' | 'alternator' | 'conductor';

export type LocationChildKind = 'busbar' | 'transformerUps' | 'load' | 'externalBusbar';

export type BlockKind = RootBlockKind | LocationChildKind | 'row';

// ─── Geometry primitives ───

/** Point in logical (Cartesian, +y up) space */
export interface LogicalPoint {
    x: number;
    y: number;
}

// ─── Block Models ───

interface BlockBase {
    id: number;
    parentId: number;
    name: string;
}

interface PlacedBlockBase extends BlockBase {
    /** Stored logical position; null until the block is first placed */
    renderPosition: LogicalPoint | null;
}

export interface LocationBlock extends PlacedBlockBase {
    kind: 'location';
}

export interface SupplyBlock extends PlacedBlockBase {
    kind: 'supply';
    voltageV: number;
    impedanceOhm: number;
}

export interface AlternatorBlock extends PlacedBlockBase {
    kind: 'alternator';
    equipmentId: string | null;
}

export interface ConductorBlock extends PlacedBlockBase {
    kind: 'conductor';
    lengthM: number;
    equipmentId: string | null;
}

export interface BusbarBlock extends PlacedBlockBase {
    kind: 'busbar';
}

export interface TransformerUpsBlock extends PlacedBlockBase {
    kind: 'transformerUps';
    equipmentId: string | null;
}

export interface LoadBlock extends PlacedBlockBase {
    kind: 'load';
    equipmentId: string | null;
}

export interface ExternalBusbarBlock extends PlacedBlockBase {
    kind: 'externalBusbar';
}

export type RowProtection = 'circuitBreaker' | 'pin';

/** A busbar row. Rows have no position of their own. */
export interface RowBlock extends BlockBase {
    kind: 'row';
    protection: RowProtection;
    /** Rating in amperes; only set for circuit breakers */
    ratingA: number | null;
}

export type Block =
    | LocationBlock
    | SupplyBlock
    | AlternatorBlock
    | ConductorBlock
    | BusbarBlock
    | TransformerUpsBlock
    | LoadBlock
    | ExternalBusbarBlock
    | RowBlock;

export type EquipmentBlock = Extract<Block, { equipmentId: string | null }>;

// ─── Terminal Model ───

export interface Terminal {
    id: number;
    /** Owning block */
    blockId: number;
    /** Index within the owner's terminal set */
    side: number;
    name: string;
}

// ─── Connection Model ───

/** Unordered pair of terminal ids */
export interface Connection {
    leftId: number;
    rightId: number;
}

export interface ConnectionCheckResult {
    allowed: boolean;
    reason: string | null;
}

// ─── Project State ───

export interface ProjectState {
    name: string;
    info: ProjectInfo;
    blocks: Record<number, Block>;
    terminals: Record<number, Terminal>;
    connections: Connection[];
    /** Next id to hand out; blocks and terminals share the id space */
    nextId: number;
    /** Bumped on every mutation */
    version: number;
    /** Bumped when blocks are added or removed */
    structureVersion: number;
    /** Bumped when connections are added or removed */
    connectionVersion: number;
    isModified: boolean;
}

// ─── Serialisation ───

export interface ProjectSnapshot {
    name: string;
    info: ProjectInfo;
    blocks: Block[];
    terminals: Terminal[];
    connections: Connection[];
    nextId: number;
    version: number;
}

// ─── Accessors ───

/** Stored position of any block; rows never carry one. */
export function getRenderPosition(block: Block): LogicalPoint | null {
    return block.kind === 'row' ? null : block.renderPosition;
}

export function isEquipmentBlock(block: Block): block is EquipmentBlock {
    return 'equipmentId' in block;
}

export function isSameConnection(c: Connection, a: number, b: number): boolean {
    return (c.leftId === a && c.rightId === b) || (c.leftId === b && c.rightId === a);
}

export function touchesTerminal(c: Connection, terminalId: number): boolean {
    return c.leftId === terminalId || c.rightId === terminalId;
}
