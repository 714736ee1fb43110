/**
 * Block Adapters — per-kind geometry behind the InteractiveBlock contract.
 *
 * BLOCK_SHAPES is the only place that knows how each kind looks; everything
 * else resolves a block through toInteractive().
 */

import type { Block, BlockKind, LogicalPoint } from '../../engine/graph/models';
import { getRenderPosition } from '../../engine/graph/models';
import type { GraphReader } from '../../engine/graph/queries';
import type { AnchorSide, Position, Size, ViewKind } from '../types';
import type {
    BlockOutline,
    ConnectionAnchor,
    InteractiveBlock,
    LiveOverride,
    ToCanvas,
} from './types';
import {
    BUSBAR_WIDTH,
    CONDUCTOR_HEIGHT,
    CONDUCTOR_WIDTH,
    EXTERNAL_BUSBAR_HEIGHT,
    EXTERNAL_BUSBAR_ROWS,
    EXTERNAL_BUSBAR_ROW_HEIGHT,
    EXTERNAL_BUSBAR_WIDTH,
    LOAD_SIZE,
    LOCATION_SIZE,
    SOURCE_SIZE,
    TRANSFORMER_CIRCLE,
    TRANSFORMER_WIDTH,
    BUSBAR_ROW_HEIGHT,
    busbarHeight,
    rowCenterY,
} from './geometry';

// ─── Shape descriptors ───

/** Anchor center relative to the block center */
interface AnchorSpec {
    x: number;
    y: number;
    side: AnchorSide;
}

interface BlockShape {
    view: ViewKind;
    draggable: boolean;
    outline: BlockOutline;
    footprint(block: Block, graph: GraphReader): Size;
    anchors(block: Block, graph: GraphReader): AnchorSpec[];
    /** Derived center for blocks without a stored position */
    center?(block: Block, graph: GraphReader, toCanvas: ToCanvas, live: LiveOverride | null): Position;
}

const fixed = (width: number, height: number) => (): Size => ({ width, height });

const bottomCenter = (height: number) => (): AnchorSpec[] => [
    { x: 0, y: height / 2, side: 'bottom' },
];

const leftRight = (width: number) => (): AnchorSpec[] => [
    { x: -width / 2, y: 0, side: 'left' },
    { x: width / 2, y: 0, side: 'right' },
];

/** Thirds of each edge, clockwise from the top-left */
function locationAnchors(): AnchorSpec[] {
    const w = LOCATION_SIZE;
    const h = LOCATION_SIZE;
    return [
        { x: w / 3 - w / 2, y: -h / 2, side: 'top' },
        { x: (2 * w) / 3 - w / 2, y: -h / 2, side: 'top' },
        { x: w / 2, y: h / 3 - h / 2, side: 'right' },
        { x: w / 2, y: (2 * h) / 3 - h / 2, side: 'right' },
        { x: (2 * w) / 3 - w / 2, y: h / 2, side: 'bottom' },
        { x: w / 3 - w / 2, y: h / 2, side: 'bottom' },
        { x: -w / 2, y: (2 * h) / 3 - h / 2, side: 'left' },
        { x: -w / 2, y: h / 3 - h / 2, side: 'left' },
    ];
}

function externalBusbarAnchors(block: Block, graph: GraphReader): AnchorSpec[] {
    if (graph.getTerminals(block.id).length !== EXTERNAL_BUSBAR_ROWS) return [];
    return Array.from({ length: EXTERNAL_BUSBAR_ROWS }, (_, i) => ({
        x: EXTERNAL_BUSBAR_WIDTH / 2,
        y: i * EXTERNAL_BUSBAR_ROW_HEIGHT + EXTERNAL_BUSBAR_ROW_HEIGHT / 2 - EXTERNAL_BUSBAR_HEIGHT / 2,
        side: 'right' as const,
    }));
}

/** Rows sit inside their busbar: same x, stacked under the name band */
function rowCenter(
    block: Block,
    graph: GraphReader,
    toCanvas: ToCanvas,
    live: LiveOverride | null,
): Position {
    const busbar = toInteractive(graph.getBlock(block.parentId), graph);
    const center = busbar.canvasCenter(toCanvas, live);
    const top = center.y - busbar.renderFootprint().height / 2;
    const index = graph.getRows(block.parentId).findIndex((r) => r.id === block.id);
    return { x: center.x, y: rowCenterY(top, Math.max(index, 0)) };
}

const BLOCK_SHAPES: Record<BlockKind, BlockShape> = {
    location: {
        view: 'layout',
        draggable: true,
        outline: 'rect',
        footprint: fixed(LOCATION_SIZE, LOCATION_SIZE),
        anchors: locationAnchors,
    },
    supply: {
        view: 'layout',
        draggable: true,
        outline: 'circle',
        footprint: fixed(SOURCE_SIZE, SOURCE_SIZE),
        anchors: bottomCenter(SOURCE_SIZE),
    },
    alternator: {
        view: 'layout',
        draggable: true,
        outline: 'diamond',
        footprint: fixed(SOURCE_SIZE, SOURCE_SIZE),
        anchors: bottomCenter(SOURCE_SIZE),
    },
    conductor: {
        view: 'layout',
        draggable: true,
        outline: 'rect',
        footprint: fixed(CONDUCTOR_WIDTH, CONDUCTOR_HEIGHT),
        anchors: leftRight(CONDUCTOR_WIDTH),
    },
    busbar: {
        view: 'location',
        draggable: true,
        outline: 'busbar',
        footprint: (block, graph) => ({
            width: BUSBAR_WIDTH,
            height: busbarHeight(graph.getRows(block.id).length),
        }),
        anchors: () => [],
    },
    row: {
        view: 'location',
        draggable: false,
        outline: 'rect',
        footprint: fixed(BUSBAR_WIDTH, BUSBAR_ROW_HEIGHT),
        anchors: leftRight(BUSBAR_WIDTH),
        center: rowCenter,
    },
    transformerUps: {
        view: 'location',
        draggable: true,
        outline: 'twinCircle',
        footprint: fixed(TRANSFORMER_WIDTH, TRANSFORMER_CIRCLE),
        anchors: leftRight(TRANSFORMER_WIDTH),
    },
    load: {
        view: 'location',
        draggable: true,
        outline: 'hexagon',
        footprint: fixed(LOAD_SIZE, LOAD_SIZE),
        anchors: bottomCenter(LOAD_SIZE),
    },
    externalBusbar: {
        view: 'location',
        draggable: true,
        outline: 'railRows',
        footprint: fixed(EXTERNAL_BUSBAR_WIDTH, EXTERNAL_BUSBAR_HEIGHT),
        anchors: externalBusbarAnchors,
    },
};

// ─── Adapter ───

const ORIGIN: LogicalPoint = { x: 0, y: 0 };

class BlockAdapter implements InteractiveBlock {
    readonly outline: BlockOutline;

    constructor(
        readonly block: Block,
        private readonly graph: GraphReader,
        private readonly shape: BlockShape,
    ) {
        this.outline = shape.outline;
    }

    preferredView(): ViewKind {
        return this.shape.view;
    }

    isDraggable(): boolean {
        return this.shape.draggable;
    }

    renderFootprint(): Size {
        return this.shape.footprint(this.block, this.graph);
    }

    connectionAnchors(dotOffset: number): ConnectionAnchor[] {
        const placements = this.shape.anchors(this.block, this.graph);
        const terminals = this.graph.getTerminals(this.block.id);
        const count = Math.min(placements.length, terminals.length);
        const anchors: ConnectionAnchor[] = [];

        for (let i = 0; i < count; i++) {
            const placement = placements[i];
            const terminal = terminals[i];
            anchors.push({
                terminalId: terminal.id,
                relX: placement.x - dotOffset,
                relY: placement.y - dotOffset,
                side: placement.side,
                tag: { blockId: this.block.id, terminalId: terminal.id },
            });
        }
        return anchors;
    }

    logicalPosition(): LogicalPoint | null {
        return getRenderPosition(this.block);
    }

    canvasCenter(toCanvas: ToCanvas, live: LiveOverride | null): Position {
        if (live && live.blockId === this.block.id) return live.center;
        if (this.shape.center) return this.shape.center(this.block, this.graph, toCanvas, live);
        return toCanvas(this.logicalPosition() ?? ORIGIN);
    }
}

export function toInteractive(block: Block, graph: GraphReader): InteractiveBlock {
    return new BlockAdapter(block, graph, BLOCK_SHAPES[block.kind]);
}
