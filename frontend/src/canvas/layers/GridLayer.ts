/**
 * GridLayer — the view's canvas sheet with a zoom-aware grid.
 *
 * Draws only inside the canvas extent; everything outside stays
 * background. Uses a single Graphics object, no per-frame allocation.
 */

import { Container, Graphics } from 'pixi.js';
import { GRID_SIZE, GRID_MAJOR_EVERY, DEFAULT_THEME } from '../types';
import type { RenderModel } from '../core/renderModel';

export class GridLayer {
    readonly container = new Container();
    private gfx = new Graphics();

    constructor() {
        this.container.addChild(this.gfx);
    }

    render(model: RenderModel): void {
        const g = this.gfx;
        g.clear();

        const { viewport, screen } = model;
        const { zoom } = viewport;
        const { width: cw, height: ch } = viewport.canvasSize;

        // Canvas sheet
        const origin = viewport.canvasToScreen({ x: 0, y: 0 });
        g.rect(origin.x, origin.y, cw * zoom, ch * zoom);
        g.fill({ color: DEFAULT_THEME.canvasFill });
        g.stroke({ width: 1, color: DEFAULT_THEME.canvasBorder });

        const cellSize = GRID_SIZE * zoom;
        if (cellSize < 4) return; // Too zoomed out

        // Visible part of the sheet, in canvas units
        const bounds = viewport.getVisibleBounds(screen.width, screen.height);
        const left = Math.max(0, bounds.left);
        const top = Math.max(0, bounds.top);
        const right = Math.min(cw, bounds.right);
        const bottom = Math.min(ch, bounds.bottom);
        if (left >= right || top >= bottom) return;

        const majorSize = GRID_SIZE * GRID_MAJOR_EVERY;
        const startX = Math.ceil(left / GRID_SIZE) * GRID_SIZE;
        const startY = Math.ceil(top / GRID_SIZE) * GRID_SIZE;

        // Minor grid dots (only when zoomed enough to see)
        if (cellSize >= 8) {
            for (let cx = startX; cx <= right; cx += GRID_SIZE) {
                for (let cy = startY; cy <= bottom; cy += GRID_SIZE) {
                    if (cx % majorSize === 0 && cy % majorSize === 0) continue;
                    const p = viewport.canvasToScreen({ x: cx, y: cy });
                    g.circle(p.x, p.y, 1);
                }
            }
            g.fill({
                color: DEFAULT_THEME.gridMinor,
                alpha: DEFAULT_THEME.gridMinorAlpha,
            });
        }

        // Major grid lines
        const sheetTop = viewport.canvasToScreen({ x: 0, y: top }).y;
        const sheetBottom = viewport.canvasToScreen({ x: 0, y: bottom }).y;
        const sheetLeft = viewport.canvasToScreen({ x: left, y: 0 }).x;
        const sheetRight = viewport.canvasToScreen({ x: right, y: 0 }).x;

        for (let cx = Math.ceil(left / majorSize) * majorSize; cx <= right; cx += majorSize) {
            const sx = cx * zoom + viewport.x;
            g.moveTo(sx, sheetTop);
            g.lineTo(sx, sheetBottom);
        }
        for (let cy = Math.ceil(top / majorSize) * majorSize; cy <= bottom; cy += majorSize) {
            const sy = cy * zoom + viewport.y;
            g.moveTo(sheetLeft, sy);
            g.lineTo(sheetRight, sy);
        }
        g.stroke({
            width: 1,
            color: DEFAULT_THEME.gridMajor,
            alpha: DEFAULT_THEME.gridMajorAlpha,
        });
    }
}
