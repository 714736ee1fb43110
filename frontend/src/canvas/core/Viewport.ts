/**
 * Viewport — per-view zoom + pan transform.
 *
 * Three spaces:
 *   logical  Cartesian, +y up, origin at the canvas center
 *   canvas   the view's canvas at zoom 1, +y down, origin top-left
 *   screen   pixels in the measured viewport: screen = pan + canvas * zoom
 *
 * No PixiJS dependency. Pure math.
 */

import type { Position, Size } from '../types';
import { CANVAS_SIZE, MAX_ZOOM, MIN_ZOOM } from '../types';
import { canvasToCartesian, cartesianToCanvas } from './coordinates';

export interface ViewportState {
    /** Pan offset X (screen pixels) */
    x: number;
    /** Pan offset Y (screen pixels) */
    y: number;
    /** Zoom factor (1 = 100%) */
    zoom: number;
}

export interface ZoomLimits {
    min: number;
    max: number;
}

const DEFAULT_ZOOM_LIMITS: ZoomLimits = { min: MIN_ZOOM, max: MAX_ZOOM };

export class Viewport {
    x = 0;
    y = 0;
    zoom = 1;

    readonly canvasSize: Size;
    readonly limits: ZoomLimits;

    constructor(
        state?: ViewportState,
        limits: ZoomLimits = DEFAULT_ZOOM_LIMITS,
        canvasSize: Size = CANVAS_SIZE,
    ) {
        this.limits = limits;
        this.canvasSize = canvasSize;
        if (state) this.setTransform(state);
    }

    // ─── Logical ↔ canvas ───

    logicalToCanvas(p: Position): Position {
        return cartesianToCanvas(this.canvasSize, p);
    }

    canvasToLogical(p: Position): Position {
        return canvasToCartesian(this.canvasSize, p);
    }

    // ─── Canvas ↔ screen ───

    canvasToScreen(p: Position): Position {
        return {
            x: p.x * this.zoom + this.x,
            y: p.y * this.zoom + this.y,
        };
    }

    screenToCanvas(p: Position): Position {
        return {
            x: (p.x - this.x) / this.zoom,
            y: (p.y - this.y) / this.zoom,
        };
    }

    // ─── Logical ↔ screen ───

    logicalToScreen(p: Position): Position {
        return this.canvasToScreen(this.logicalToCanvas(p));
    }

    screenToLogical(p: Position): Position {
        return this.canvasToLogical(this.screenToCanvas(p));
    }

    // ─── Mutations ───

    pan(dx: number, dy: number): void {
        this.x += dx;
        this.y += dy;
    }

    /**
     * Step the zoom additively and keep `pivot` (screen space) stationary.
     * Returns false when the clamp left the zoom unchanged.
     */
    zoomBy(delta: number, pivot: Position): boolean {
        const oldZoom = this.zoom;
        const newZoom = clamp(oldZoom + delta, this.limits.min, this.limits.max);
        if (newZoom === oldZoom) return false;

        const ratio = newZoom / oldZoom;
        this.x = pivot.x - (pivot.x - this.x) * ratio;
        this.y = pivot.y - (pivot.y - this.y) * ratio;
        this.zoom = newZoom;
        return true;
    }

    setTransform(state: ViewportState): void {
        this.x = state.x;
        this.y = state.y;
        this.zoom = clamp(state.zoom, this.limits.min, this.limits.max);
    }

    // ─── Visible bounds (canvas coords) ───

    getVisibleBounds(
        screenW: number,
        screenH: number,
    ): { left: number; top: number; right: number; bottom: number } {
        const tl = this.screenToCanvas({ x: 0, y: 0 });
        const br = this.screenToCanvas({ x: screenW, y: screenH });
        return { left: tl.x, top: tl.y, right: br.x, bottom: br.y };
    }

    toState(): ViewportState {
        return { x: this.x, y: this.y, zoom: this.zoom };
    }
}

function clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
}
