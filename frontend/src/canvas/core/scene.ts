/**
 * Scene — the renderable blocks and anchor dots of one view, resolved
 * through the InteractiveBlock contract into canvas space.
 *
 * Shared by the renderer, hit testing and fit-to-content.
 */

import type { Connection } from '../../engine/graph/models';
import { ROOT_PARENT_ID } from '../../engine/graph/models';
import type { GraphReader } from '../../engine/graph/queries';
import { toInteractive } from '../blocks/adapters';
import type { InteractiveBlock, LiveOverride } from '../blocks/types';
import type { AnchorSide, AnchorTag, Position, Rect, Size, ViewSubject } from '../types';
import { DOT_OFFSET, DOT_SIZE } from '../types';
import { routeConnection } from '../utils/routing';
import { rectFromCenter } from './coordinates';
import type { Viewport } from './Viewport';

export interface SceneItem {
    interactive: InteractiveBlock;
    /** Canvas-space center */
    center: Position;
    size: Size;
    /** Canvas-space bounds */
    rect: Rect;
    /** Nested inside another scene item (busbar rows) */
    nested: boolean;
}

export interface SceneAnchor {
    tag: AnchorTag;
    side: AnchorSide;
    /** Canvas-space dot top-left */
    topLeft: Position;
    /** Canvas-space dot center */
    center: Position;
}

export interface Scene {
    items: SceneItem[];
    anchors: SceneAnchor[];
}

export interface ConnectionRoute {
    connection: Connection;
    /** Canvas-space polyline */
    points: Position[];
}

/**
 * Blocks rendered by a view, parents before the blocks nested in them.
 * Layout: root blocks that prefer the layout view.
 * Location: that location's children that prefer a location view, plus
 * anything nested one level below them (busbar rows).
 */
function viewBlocks(graph: GraphReader, subject: ViewSubject): { interactive: InteractiveBlock; nested: boolean }[] {
    if (subject.kind === 'layout') {
        return graph
            .getChildren(ROOT_PARENT_ID)
            .map((b) => toInteractive(b, graph))
            .filter((ib) => ib.preferredView() === 'layout')
            .map((interactive) => ({ interactive, nested: false }));
    }

    const result: { interactive: InteractiveBlock; nested: boolean }[] = [];
    for (const child of graph.getChildren(subject.locationId)) {
        const interactive = toInteractive(child, graph);
        if (interactive.preferredView() !== 'location') continue;
        result.push({ interactive, nested: false });

        for (const grandchild of graph.getChildren(child.id)) {
            const nested = toInteractive(grandchild, graph);
            if (nested.preferredView() === 'location') {
                result.push({ interactive: nested, nested: true });
            }
        }
    }
    return result;
}

/** Changes whenever a view gains, loses or re-places a block */
export function viewContentKey(graph: GraphReader, subject: ViewSubject): string {
    return viewBlocks(graph, subject)
        .map(({ interactive }) => {
            const c = interactive.canvasCenter((p) => p, null);
            return `${interactive.block.id}@${c.x},${c.y}`;
        })
        .join(';');
}

/** The view a block is edited in: its enclosing location, or the layout for root blocks */
export function homeView(graph: GraphReader, blockId: number): ViewSubject {
    let block = graph.getBlock(blockId);
    while (block.parentId !== ROOT_PARENT_ID) {
        const parent = graph.getBlock(block.parentId);
        if (parent.kind === 'location') return { kind: 'location', locationId: parent.id };
        block = parent;
    }
    return { kind: 'layout' };
}

export function buildScene(
    graph: GraphReader,
    subject: ViewSubject,
    viewport: Viewport,
    live: LiveOverride | null = null,
): Scene {
    const toCanvas = (p: Position) => viewport.logicalToCanvas(p);
    const items: SceneItem[] = [];
    const anchors: SceneAnchor[] = [];

    for (const { interactive, nested } of viewBlocks(graph, subject)) {
        const center = interactive.canvasCenter(toCanvas, live);
        const size = interactive.renderFootprint();
        items.push({ interactive, center, size, rect: rectFromCenter(center, size), nested });

        for (const anchor of interactive.connectionAnchors(DOT_OFFSET)) {
            const topLeft = { x: center.x + anchor.relX, y: center.y + anchor.relY };
            anchors.push({
                tag: anchor.tag,
                side: anchor.side,
                topLeft,
                center: { x: topLeft.x + DOT_SIZE / 2, y: topLeft.y + DOT_SIZE / 2 },
            });
        }
    }

    return { items, anchors };
}

export function findSceneAnchor(scene: Scene, terminalId: number): SceneAnchor | null {
    return scene.anchors.find((a) => a.tag.terminalId === terminalId) ?? null;
}

/** Connections whose both ends are rendered in this scene */
export function routeSceneConnections(scene: Scene, connections: Connection[]): ConnectionRoute[] {
    const routes: ConnectionRoute[] = [];
    for (const connection of connections) {
        const from = findSceneAnchor(scene, connection.leftId);
        const to = findSceneAnchor(scene, connection.rightId);
        if (!from || !to) continue;
        routes.push({
            connection,
            points: routeConnection(
                { point: from.center, side: from.side },
                { point: to.center, side: to.side },
            ),
        });
    }
    return routes;
}
