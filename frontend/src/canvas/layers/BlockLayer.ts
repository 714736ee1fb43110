/**
 * BlockLayer — block bodies and labels for one view.
 *
 * Each block gets its own Container with cached Graphics; sprites of
 * blocks that left the scene are destroyed. Shapes come from the block's
 * outline, never from its kind.
 */

import { Container, Graphics, Text, TextStyle } from 'pixi.js';
import { DEFAULT_THEME } from '../types';
import type { Position, Size } from '../types';
import type { BlockOutline } from '../blocks/types';
import { BUSBAR_NAME_HEIGHT, EXTERNAL_BUSBAR_ROWS, TRANSFORMER_CIRCLE } from '../blocks/geometry';
import type { RenderModel } from '../core/renderModel';
import { blockLabels } from '../core/renderModel';
import type { SceneItem } from '../core/scene';

interface BlockSprite {
    container: Container;
    body: Graphics;
    labels: Text[];
}

type OutlineDrawer = (g: Graphics, size: Size, zoom: number) => void;

function polygon(g: Graphics, points: Position[]): void {
    g.poly(points.flatMap((p) => [p.x, p.y]));
}

/** Outline paths in sprite-local screen units, origin at the top-left */
const OUTLINES: Record<BlockOutline, OutlineDrawer> = {
    rect: (g, { width, height }) => {
        g.rect(0, 0, width, height);
    },
    circle: (g, { width }) => {
        g.circle(width / 2, width / 2, width / 2);
    },
    diamond: (g, { width, height }) => {
        polygon(g, [
            { x: width / 2, y: 0 },
            { x: width, y: height / 2 },
            { x: width / 2, y: height },
            { x: 0, y: height / 2 },
        ]);
    },
    hexagon: (g, { width, height }) => {
        const inset = width / 4;
        polygon(g, [
            { x: inset, y: 0 },
            { x: width - inset, y: 0 },
            { x: width, y: height / 2 },
            { x: width - inset, y: height },
            { x: inset, y: height },
            { x: 0, y: height / 2 },
        ]);
    },
    twinCircle: (g, { width, height }, zoom) => {
        const r = (TRANSFORMER_CIRCLE * zoom) / 2;
        g.circle(r, height / 2, r);
        g.circle(width - r, height / 2, r);
    },
    busbar: (g, { width, height }, zoom) => {
        g.rect(0, 0, width, height);
        g.moveTo(0, BUSBAR_NAME_HEIGHT * zoom);
        g.lineTo(width, BUSBAR_NAME_HEIGHT * zoom);
    },
    railRows: (g, { width, height }) => {
        g.rect(0, 0, width, height);
        const rowHeight = height / EXTERNAL_BUSBAR_ROWS;
        for (let i = 1; i < EXTERNAL_BUSBAR_ROWS; i++) {
            g.moveTo(0, i * rowHeight);
            g.lineTo(width, i * rowHeight);
        }
    },
};

export class BlockLayer {
    readonly container = new Container();
    private sprites = new Map<number, BlockSprite>();

    render(model: RenderModel): void {
        const { viewport, scene } = model;
        const present = new Set<number>();

        for (const item of scene.items) {
            const blockId = item.interactive.block.id;
            present.add(blockId);

            let sprite = this.sprites.get(blockId);
            if (!sprite) {
                sprite = this.createSprite();
                this.sprites.set(blockId, sprite);
                this.container.addChild(sprite.container);
            }
            this.renderBlock(sprite, item, model, viewport.zoom);

            const topLeft = viewport.canvasToScreen({ x: item.rect.x, y: item.rect.y });
            sprite.container.x = topLeft.x;
            sprite.container.y = topLeft.y;
        }

        for (const id of [...this.sprites.keys()]) {
            if (!present.has(id)) this.removeSprite(id);
        }

        // Nested items (rows) are drawn over their parent
        for (const item of scene.items) {
            const sprite = this.sprites.get(item.interactive.block.id);
            if (sprite) this.container.addChild(sprite.container);
        }
    }

    // ─── Private ───

    private createSprite(): BlockSprite {
        const container = new Container();
        const body = new Graphics();
        container.addChild(body);
        return { container, body, labels: [] };
    }

    private removeSprite(blockId: number): void {
        const sprite = this.sprites.get(blockId);
        if (sprite) {
            this.container.removeChild(sprite.container);
            sprite.container.destroy({ children: true });
            this.sprites.delete(blockId);
        }
    }

    private renderBlock(sprite: BlockSprite, item: SceneItem, model: RenderModel, zoom: number): void {
        const blockId = item.interactive.block.id;
        const size = { width: item.size.width * zoom, height: item.size.height * zoom };

        let borderColor = DEFAULT_THEME.blockBorder;
        let borderWidth = 1.5;
        if (model.draggingBlockId === blockId) {
            borderColor = DEFAULT_THEME.blockBorderDragging;
            borderWidth = 2.5;
        } else if (model.selectedBlockId === blockId) {
            borderColor = DEFAULT_THEME.blockBorderSelected;
            borderWidth = 2.5;
        }

        const body = sprite.body;
        body.clear();
        OUTLINES[item.interactive.outline](body, size, zoom);
        body.fill({ color: item.nested ? DEFAULT_THEME.rowFill : DEFAULT_THEME.blockFill });
        body.stroke({ width: borderWidth, color: borderColor });

        // Remove old labels
        for (const label of sprite.labels) {
            sprite.container.removeChild(label);
            label.destroy();
        }
        sprite.labels = [];
        if (zoom <= 0.3) return;

        const lines = blockLabels(item.interactive.block);
        lines.forEach((line, i) => {
            const text = new Text({
                text: line,
                style: new TextStyle({
                    fontSize: Math.max(9, (i === 0 ? 13 : 11) * zoom),
                    fontFamily: i === 0 ? 'Inter, system-ui, sans-serif' : 'JetBrains Mono, monospace',
                    fontWeight: i === 0 ? '600' : '400',
                    fill: i === 0 ? DEFAULT_THEME.text : DEFAULT_THEME.textMuted,
                }),
            });
            text.x = 8 * zoom;
            text.y = (8 + i * 16) * zoom;
            sprite.labels.push(text);
            sprite.container.addChild(text);
        });
    }
}
