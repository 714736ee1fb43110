/**
 * ConnectionLayer — Object-pooled connection line rendering.
 *
 * Maintains a pool of Graphics objects so lines don't
 * allocate/deallocate every frame. Routes arrive precomputed
 * in canvas space; only the projection to screen happens here.
 */

import { Container, Graphics } from 'pixi.js';
import { DEFAULT_THEME } from '../types';
import type { RenderModel } from '../core/renderModel';

const LINE_WIDTH = 2;

// ─── Object Pool ───

class GraphicsPool {
    private available: Graphics[] = [];
    private inUse: Graphics[] = [];
    private parent: Container;

    constructor(parent: Container) {
        this.parent = parent;
    }

    acquire(): Graphics {
        let gfx = this.available.pop();
        if (!gfx) {
            gfx = new Graphics();
            this.parent.addChild(gfx);
        }
        gfx.visible = true;
        this.inUse.push(gfx);
        return gfx;
    }

    releaseAll(): void {
        for (const gfx of this.inUse) {
            gfx.clear();
            gfx.visible = false;
        }
        this.available.push(...this.inUse);
        this.inUse = [];
    }
}

// ─── ConnectionLayer ───

export class ConnectionLayer {
    readonly container = new Container();
    private pool = new GraphicsPool(this.container);

    render(model: RenderModel): void {
        this.pool.releaseAll();
        const { viewport } = model;
        const color = model.removeMode ? DEFAULT_THEME.connectionRemovable : DEFAULT_THEME.connection;

        for (const route of model.routes) {
            if (route.points.length < 2) continue;

            const gfx = this.pool.acquire();
            const [first, ...rest] = route.points.map((p) => viewport.canvasToScreen(p));
            gfx.moveTo(first.x, first.y);
            for (const p of rest) gfx.lineTo(p.x, p.y);
            gfx.stroke({ width: LINE_WIDTH * viewport.zoom, color });
        }
    }
}
