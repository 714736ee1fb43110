/**
 * Render Model — everything the pixi layers draw for one view, resolved
 * from the stores in one place.
 *
 * Pure data; the layers never read the stores themselves.
 */

import type { Block } from '../../engine/graph/models';
import { isEquipmentBlock } from '../../engine/graph/models';
import { useProjectStore } from '../../engine/graph/projectStore';
import { useViewStore } from '../../store/viewStore';
import { useInteractionStore } from '../../store/interactionStore';
import { useConnectionStore } from '../../store/connectionStore';
import type { Size, ViewKey } from '../types';
import { buildScene, routeSceneConnections } from './scene';
import type { ConnectionRoute, Scene } from './scene';
import type { Viewport } from './Viewport';

export interface RenderModel {
    viewKey: ViewKey;
    viewport: Viewport;
    /** Measured viewport; zero until the first resize */
    screen: Size;
    scene: Scene;
    selectedBlockId: number | null;
    draggingBlockId: number | null;
    routes: ConnectionRoute[];
    showAnchors: boolean;
    pendingTerminalId: number | null;
    /** Lines are drawn as removable and respond to clicks */
    removeMode: boolean;
}

// ─── Labels ───

const PROTECTION_LABELS = {
    circuitBreaker: 'CB',
    pin: 'Pin',
} as const;

/** Text lines drawn inside a block */
export function blockLabels(block: Block): string[] {
    if (block.kind === 'row') {
        const protection = PROTECTION_LABELS[block.protection];
        return [block.ratingA === null ? protection : `${protection} ${block.ratingA}A`];
    }

    const lines = [block.name];
    if (isEquipmentBlock(block) && block.equipmentId) lines.push(block.equipmentId);
    if (block.kind === 'supply') lines.push(`${block.voltageV} V`);
    if (block.kind === 'conductor') lines.push(`${block.lengthM} m`);
    return lines;
}

// ─── Model ───

export function buildRenderModel(viewKey: ViewKey): RenderModel {
    const project = useProjectStore.getState();
    const views = useViewStore.getState();
    const { interaction } = useInteractionStore.getState();
    const { editMode, removeMode, pending } = useConnectionStore.getState();

    const tab = views.findTab(viewKey);
    const viewport = views.getViewport(viewKey);
    const scene = tab
        ? buildScene(project.reader(), tab.subject, viewport, useInteractionStore.getState().liveOverride(viewKey))
        : { items: [], anchors: [] };

    const ownSelection = interaction.phase !== 'idle' && interaction.selection.viewKey === viewKey;

    return {
        viewKey,
        viewport,
        screen: tab?.viewportSize ?? { width: 0, height: 0 },
        scene,
        selectedBlockId: ownSelection ? interaction.selection.blockId : null,
        draggingBlockId: ownSelection && interaction.phase === 'dragging' ? interaction.selection.blockId : null,
        routes: routeSceneConnections(scene, project.reader().getAllConnections()),
        showAnchors: editMode,
        pendingTerminalId: pending?.terminalId ?? null,
        removeMode,
    };
}
