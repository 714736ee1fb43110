import type { AnchorSide, Position } from '../types';

/** Straight run out of an anchor before the route may turn */
const ROUTE_STUB = 20;

const SIDE_DIRECTION: Record<AnchorSide, Position> = {
    top: { x: 0, y: -1 },
    right: { x: 1, y: 0 },
    bottom: { x: 0, y: 1 },
    left: { x: -1, y: 0 },
};

export interface RouteEnd {
    /** Canvas-space anchor center */
    point: Position;
    side: AnchorSide;
}

/**
 * Compute orthogonal (Manhattan) route between two points.
 * Produces a path with only horizontal and vertical segments.
 * Uses a midpoint-split strategy for clean right-angle routing.
 */
export function computeOrthogonalRoute(start: Position, end: Position): Position[] {
    const dx = end.x - start.x;
    const dy = end.y - start.y;

    // Aligned (or coincident) ends need no bend
    if (Math.abs(dx) < 1 || Math.abs(dy) < 1) return [start, end];

    const midX = start.x + dx / 2;

    return [start, { x: midX, y: start.y }, { x: midX, y: end.y }, end];
}

/**
 * Route a connection line between two anchors: leave each anchor
 * perpendicular to its block edge, then join the stub ends orthogonally.
 */
export function routeConnection(from: RouteEnd, to: RouteEnd, stub: number = ROUTE_STUB): Position[] {
    const a = stubEnd(from, stub);
    const b = stubEnd(to, stub);
    return dedupe([from.point, ...computeOrthogonalRoute(a, b), to.point]);
}

/**
 * Compute snapped position to grid.
 */
export function snapToGrid(pos: Position, gridSize: number): Position {
    return {
        x: Math.round(pos.x / gridSize) * gridSize,
        y: Math.round(pos.y / gridSize) * gridSize,
    };
}

// ─── Helpers ───

function stubEnd(end: RouteEnd, stub: number): Position {
    const dir = SIDE_DIRECTION[end.side];
    return { x: end.point.x + dir.x * stub, y: end.point.y + dir.y * stub };
}

function dedupe(points: Position[]): Position[] {
    return points.filter((p, i) => i === 0 || p.x !== points[i - 1].x || p.y !== points[i - 1].y);
}
