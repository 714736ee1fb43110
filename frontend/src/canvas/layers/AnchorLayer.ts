/**
 * AnchorLayer — connection anchor dots, shown in connection-edit mode.
 *
 * Always drawn on top. The pending first pick is highlighted.
 */

import { Container, Graphics } from 'pixi.js';
import { DEFAULT_THEME, DOT_SIZE } from '../types';
import type { RenderModel } from '../core/renderModel';

export class AnchorLayer {
    readonly container = new Container();
    private gfx = new Graphics();
    private pendingGfx = new Graphics();

    constructor() {
        this.container.addChild(this.gfx);
        this.container.addChild(this.pendingGfx);
    }

    render(model: RenderModel): void {
        this.gfx.clear();
        this.pendingGfx.clear();
        if (!model.showAnchors) return;

        const { viewport } = model;
        const size = DOT_SIZE * viewport.zoom;
        let drawn = false;

        for (const anchor of model.scene.anchors) {
            const p = viewport.canvasToScreen(anchor.topLeft);
            if (anchor.tag.terminalId === model.pendingTerminalId) {
                this.pendingGfx.rect(p.x, p.y, size, size);
                this.pendingGfx.fill({ color: DEFAULT_THEME.anchorPending });
                continue;
            }
            this.gfx.rect(p.x, p.y, size, size);
            drawn = true;
        }

        if (drawn) this.gfx.fill({ color: DEFAULT_THEME.anchorDefault });
    }
}
