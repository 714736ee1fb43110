/**
 * Pointer Routing — raw pointer, wheel and key events to store actions.
 *
 * Every handler works on one view (tab key) and screen coordinates
 * relative to that view's canvas element. Hit testing runs against the
 * scene as currently rendered, live drag included.
 */

import { useProjectStore } from '../../engine/graph/projectStore';
import { useViewStore } from '../../store/viewStore';
import { useInteractionStore } from '../../store/interactionStore';
import { useConnectionStore } from '../../store/connectionStore';
import { getEditorConfig } from '../../config/editorConfig';
import { HitTester } from '../core/HitTester';
import type { HitResult } from '../core/HitTester';
import { buildScene, routeSceneConnections } from '../core/scene';
import type { Scene } from '../core/scene';
import type { Position, ViewKey } from '../types';

const EMPTY_SCENE: Scene = { items: [], anchors: [] };

const hitTester = new HitTester();

// ─── Scene ───

function resolveScene(viewKey: ViewKey): Scene {
    const tab = useViewStore.getState().findTab(viewKey);
    if (!tab) return EMPTY_SCENE;

    return buildScene(
        useProjectStore.getState().reader(),
        tab.subject,
        useViewStore.getState().getViewport(viewKey),
        useInteractionStore.getState().liveOverride(viewKey),
    );
}

function hitTestView(viewKey: ViewKey, screen: Position): HitResult {
    const { editMode, removeMode } = useConnectionStore.getState();
    const scene = resolveScene(viewKey);
    const routes = removeMode
        ? routeSceneConnections(scene, useProjectStore.getState().reader().getAllConnections())
        : [];

    hitTester.setScene(scene, routes);
    return hitTester.hitTestScreen(screen, useViewStore.getState().getViewport(viewKey), {
        anchors: editMode,
        connections: removeMode,
        anchorRadius: getEditorConfig().anchorHitRadius,
    });
}

// ─── Pointer ───

export function handlePointerDown(viewKey: ViewKey, screen: Position): void {
    const interaction = useInteractionStore.getState();
    const connection = useConnectionStore.getState();
    if (interaction.isDragActive()) return;

    const hit = hitTestView(viewKey, screen);

    if (hit?.kind === 'anchor') {
        connection.pickAnchor(hit.anchor.tag, viewKey);
        return;
    }

    if (hit?.kind === 'connection') {
        connection.removeLine(hit.connection);
        return;
    }

    if (hit?.kind === 'block' && !connection.editMode && !connection.removeMode) {
        interaction.pressBlock(viewKey, hit.blockId, screen);
        return;
    }

    connection.cancelPick();
    interaction.pressBackground(viewKey, screen);
}

export function handlePointerMove(viewKey: ViewKey, screen: Position): void {
    useInteractionStore.getState().movePointer(viewKey, screen);
}

export function handlePointerUp(): void {
    useInteractionStore.getState().release();
}

/** Location blocks on the layout view open their own tab */
export function handleDoubleClick(viewKey: ViewKey, screen: Position): ViewKey | null {
    const { editMode, removeMode } = useConnectionStore.getState();
    if (viewKey !== 'layout' || editMode || removeMode) return null;

    const hit = hitTestView(viewKey, screen);
    if (hit?.kind !== 'block' || hit.item.interactive.block.kind !== 'location') return null;
    return useViewStore.getState().openLocationTab(hit.blockId);
}

// ─── Wheel ───

/** One zoom step per wheel notch, pivoting on the pointer */
export function handleWheel(viewKey: ViewKey, screen: Position, deltaY: number): void {
    if (deltaY === 0) return;
    const step = getEditorConfig().zoomStep;
    useViewStore.getState().zoomBy(viewKey, deltaY < 0 ? step : -step, screen);
}

// ─── Keyboard ───

export interface KeyInput {
    key: string;
    ctrlKey: boolean;
    metaKey: boolean;
}

/** Returns true when the key was consumed */
export function handleKeyDown(viewKey: ViewKey, e: KeyInput): boolean {
    const interaction = useInteractionStore.getState();
    const connection = useConnectionStore.getState();
    const views = useViewStore.getState();
    const modifier = e.ctrlKey || e.metaKey;

    if (e.key === 'Escape') {
        if (connection.pending) connection.cancelPick();
        else if (connection.removeMode) connection.exitRemoveMode();
        else if (!interaction.isDragActive()) interaction.deselectAll();
        return true;
    }

    if (e.key === 'Delete' || e.key === 'Backspace') {
        return interaction.deleteSelection();
    }

    if (!modifier) return false;

    switch (e.key) {
        case '0':
            views.fitToContent(viewKey);
            return true;
        case '=':
        case '+':
            views.zoomIn(viewKey);
            return true;
        case '-':
            views.zoomOut(viewKey);
            return true;
        default:
            return false;
    }
}
