/**
 * Interactive Block — the capability surface every placeable block offers
 * to rendering, hit testing, anchor placement and fit-to-content.
 *
 * Generic canvas code talks to blocks only through this interface.
 */

import type { Block, LogicalPoint } from '../../engine/graph/models';
import type { AnchorSide, AnchorTag, Position, Size, ViewKind } from '../types';

/** How the renderer outlines a block */
export type BlockOutline =
    | 'rect'
    | 'circle'
    | 'diamond'
    | 'hexagon'
    | 'twinCircle'
    | 'busbar'
    | 'railRows';

export interface ConnectionAnchor {
    terminalId: number;
    /** Dot top-left relative to the block center (canvas orientation) */
    relX: number;
    relY: number;
    side: AnchorSide;
    tag: AnchorTag;
}

/** Live (uncommitted) center of a block being dragged, in canvas space */
export interface LiveOverride {
    blockId: number;
    center: Position;
}

export type ToCanvas = (p: LogicalPoint) => Position;

export interface InteractiveBlock {
    readonly block: Block;
    readonly outline: BlockOutline;
    preferredView(): ViewKind;
    isDraggable(): boolean;
    /** Width and height in logical units */
    renderFootprint(): Size;
    /** Anchor dots, one per terminal, in the owner's terminal order */
    connectionAnchors(dotOffset: number): ConnectionAnchor[];
    logicalPosition(): LogicalPoint | null;
    /** Center in the view's canvas space; a live drag wins over the stored position */
    canvasCenter(toCanvas: ToCanvas, live: LiveOverride | null): Position;
}
