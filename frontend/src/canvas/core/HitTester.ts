/**
 * HitTester — Spatial query abstraction for scene items.
 *
 * Provides fast lookups for what's under a screen/canvas coordinate.
 * No PixiJS dependency. Operates on bounding boxes.
 */

import type { Connection } from '../../engine/graph/models';
import type { Position } from '../types';
import { ANCHOR_HIT_RADIUS, LINE_HIT_TOLERANCE } from '../types';
import { distance, distanceToSegment, rectContains } from './coordinates';
import type { ConnectionRoute, Scene, SceneAnchor, SceneItem } from './scene';
import type { Viewport } from './Viewport';

// ─── Hit Results ───

export interface BlockHit {
    kind: 'block';
    blockId: number;
    item: SceneItem;
}

export interface AnchorHit {
    kind: 'anchor';
    anchor: SceneAnchor;
    distance: number;
}

export interface ConnectionHit {
    kind: 'connection';
    connection: Connection;
    distance: number;
}

export type HitResult = BlockHit | AnchorHit | ConnectionHit | null;

export interface HitOptions {
    /** Test anchor dots (connection-edit mode only) */
    anchors: boolean;
    /** Anchor radius in screen pixels */
    anchorRadius?: number;
    /** Test connection lines (remove-connection mode only) */
    connections?: boolean;
    /** Line pick distance in screen pixels */
    lineTolerance?: number;
}

// ─── HitTester ───

export class HitTester {
    private scene: Scene = { items: [], anchors: [] };
    private routes: ConnectionRoute[] = [];

    /** Update the scene (call when blocks move or change) */
    setScene(scene: Scene, routes: ConnectionRoute[] = []): void {
        this.scene = scene;
        this.routes = routes;
    }

    // ─── Point queries ───

    /**
     * Find the topmost block at a canvas coordinate.
     * Tests in reverse order (last drawn = on top), so rows win over their busbar.
     */
    hitTestBlock(p: Position): BlockHit | null {
        const { items } = this.scene;
        for (let i = items.length - 1; i >= 0; i--) {
            const item = items[i];
            if (rectContains(item.rect, p)) {
                return { kind: 'block', blockId: item.interactive.block.id, item };
            }
        }
        return null;
    }

    /**
     * Find the closest anchor within `radius` canvas units.
     */
    hitTestAnchor(p: Position, radius: number): AnchorHit | null {
        let best: AnchorHit | null = null;

        for (const anchor of this.scene.anchors) {
            const dist = distance(p, anchor.center);
            if (dist <= radius && (!best || dist < best.distance)) {
                best = { kind: 'anchor', anchor, distance: dist };
            }
        }

        return best;
    }

    /**
     * Find the connection line closest to a canvas coordinate, within `tolerance`.
     */
    hitTestConnection(p: Position, tolerance: number): ConnectionHit | null {
        let best: ConnectionHit | null = null;

        for (const route of this.routes) {
            for (let i = 1; i < route.points.length; i++) {
                const dist = distanceToSegment(p, route.points[i - 1], route.points[i]);
                if (dist <= tolerance && (!best || dist < best.distance)) {
                    best = { kind: 'connection', connection: route.connection, distance: dist };
                }
            }
        }

        return best;
    }

    /**
     * Test a screen-space point, converting via viewport.
     */
    hitTestScreen(screen: Position, viewport: Viewport, options: HitOptions): HitResult {
        const p = viewport.screenToCanvas(screen);

        // Anchors take priority (smaller target)
        if (options.anchors) {
            const radius = (options.anchorRadius ?? ANCHOR_HIT_RADIUS) / viewport.zoom;
            const anchor = this.hitTestAnchor(p, radius);
            if (anchor) return anchor;
        }

        if (options.connections) {
            const tolerance = (options.lineTolerance ?? LINE_HIT_TOLERANCE) / viewport.zoom;
            const line = this.hitTestConnection(p, tolerance);
            if (line) return line;
        }

        return this.hitTestBlock(p);
    }
}
