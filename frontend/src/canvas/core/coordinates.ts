/**
 * Coordinates — logical (Cartesian, +y up) ↔ canvas (+y down, origin top-left).
 *
 * The logical origin sits at the center of a view's canvas. Every view has
 * its own canvas, so callers pick the entry point matching the view they
 * draw into: layoutToCanvas for the Layout view, Viewport.logicalToCanvas
 * for any view's own transform.
 */

import type { Position, Rect, Size } from '../types';
import { CANVAS_SIZE } from '../types';

export function cartesianToCanvas(canvas: Size, p: Position): Position {
    return {
        x: canvas.width / 2 + p.x,
        y: canvas.height / 2 - p.y,
    };
}

/** Inverse of cartesianToCanvas, rounded to whole logical units */
export function canvasToCartesian(canvas: Size, p: Position): Position {
    return {
        x: Math.round(p.x - canvas.width / 2) || 0,
        y: Math.round(canvas.height / 2 - p.y) || 0,
    };
}

/** Layout view entry point */
export function layoutToCanvas(p: Position): Position {
    return cartesianToCanvas(CANVAS_SIZE, p);
}

// ─── Rect helpers ───

export function rectFromCenter(center: Position, size: Size): Rect {
    return {
        x: center.x - size.width / 2,
        y: center.y - size.height / 2,
        width: size.width,
        height: size.height,
    };
}

export function rectCenter(rect: Rect): Position {
    return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function rectContains(rect: Rect, p: Position): boolean {
    return (
        p.x >= rect.x &&
        p.x <= rect.x + rect.width &&
        p.y >= rect.y &&
        p.y <= rect.y + rect.height
    );
}

export function unionRects(rects: Rect[]): Rect | null {
    if (rects.length === 0) return null;

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const r of rects) {
        minX = Math.min(minX, r.x);
        minY = Math.min(minY, r.y);
        maxX = Math.max(maxX, r.x + r.width);
        maxY = Math.max(maxY, r.y + r.height);
    }
    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

export function distance(a: Position, b: Position): number {
    return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

/** Shortest distance from `p` to the segment a–b */
export function distanceToSegment(p: Position, a: Position, b: Position): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const lengthSq = dx * dx + dy * dy;
    if (lengthSq === 0) return distance(p, a);

    const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
    return distance(p, { x: a.x + t * dx, y: a.y + t * dy });
}
