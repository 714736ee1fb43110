import { create } from 'zustand';

import { useProjectStore } from '../engine/graph/projectStore';
import { InvalidBlockError, NotFoundError } from '../engine/graph/errors';
import { toInteractive } from '../canvas/blocks/adapters';
import type { LiveOverride } from '../canvas/blocks/types';
import type { Position, ViewKey } from '../canvas/types';
import { snapToGrid } from '../canvas/utils/routing';
import { getEditorConfig } from '../config/editorConfig';
import { useViewStore } from './viewStore';

/* ─── State Shape ─── */

export interface Selection {
    blockId: number;
    viewKey: ViewKey;
}

/**
 * Single interaction value; a drag always carries its selection, so there
 * is no "dragging but nothing selected" state to guard against.
 */
export type Interaction =
    | { phase: 'idle' }
    | { phase: 'selected'; selection: Selection }
    | {
          phase: 'dragging';
          selection: Selection;
          /** Canvas-space press point minus the block's center */
          grabOffset: Position;
          /** Live canvas-space center of the dragged block */
          center: Position;
          /** Canvas-space center when the drag began */
          origin: Position;
      };

interface PanGesture {
    viewKey: ViewKey;
    last: Position;
}

interface InteractionState {
    interaction: Interaction;
    pan: PanGesture | null;
}

interface InteractionActions {
    // ─── Selection ───
    selectBlock: (blockId: number, viewKey?: ViewKey) => void;
    deselectAll: () => void;
    selectedBlockId: () => number | null;
    deleteSelection: () => boolean;

    // ─── Pointer ───
    pressBlock: (viewKey: ViewKey, blockId: number, screen: Position) => void;
    pressBackground: (viewKey: ViewKey, screen: Position) => void;
    movePointer: (viewKey: ViewKey, screen: Position) => void;
    release: () => void;

    // ─── Drag ───
    isDragActive: () => boolean;
    liveOverride: (viewKey: ViewKey) => LiveOverride | null;

    // ─── Graph / tab changes ───
    handleStructureChange: () => void;
    handleTabClosed: (viewKey: ViewKey) => void;

    reset: () => void;
}

export type InteractionStore = InteractionState & InteractionActions;

const IDLE: Interaction = { phase: 'idle' };

const initialState: InteractionState = {
    interaction: IDLE,
    pan: null,
};

/* ─── Helpers ─── */

/** Canvas-space center of a block in one view, at its committed position */
function committedCenter(viewKey: ViewKey, blockId: number): { center: Position; draggable: boolean } {
    const graph = useProjectStore.getState().reader();
    const viewport = useViewStore.getState().getViewport(viewKey);
    const interactive = toInteractive(graph.getBlock(blockId), graph);

    return {
        center: interactive.canvasCenter((p) => viewport.logicalToCanvas(p), null),
        draggable: interactive.isDraggable(),
    };
}

function samePoint(a: Position, b: Position): boolean {
    return a.x === b.x && a.y === b.y;
}

/* ─── Store ─── */

export const useInteractionStore = create<InteractionStore>((set, get) => ({
    ...initialState,

    // ─── Selection ───

    selectBlock: (blockId, viewKey) => {
        if (get().isDragActive()) return;
        // unknown ids surface as NotFound
        useProjectStore.getState().getBlock(blockId);
        set({
            interaction: {
                phase: 'selected',
                selection: { blockId, viewKey: viewKey ?? useViewStore.getState().activeKey },
            },
        });
        useViewStore.getState().refreshOverlays();
    },

    deselectAll: () => {
        if (get().interaction.phase === 'idle' && !get().pan) return;
        set({ interaction: IDLE, pan: null });
        useViewStore.getState().refreshOverlays();
    },

    selectedBlockId: () => {
        const { interaction } = get();
        return interaction.phase === 'idle' ? null : interaction.selection.blockId;
    },

    deleteSelection: () => {
        const { interaction } = get();
        if (interaction.phase !== 'selected') return false;

        try {
            useProjectStore.getState().removeBlock(interaction.selection.blockId);
        } catch (err) {
            if (err instanceof InvalidBlockError) {
                console.warn(`[Graph] ${err.message}`);
                return false;
            }
            if (!(err instanceof NotFoundError)) throw err;
        }
        set({ interaction: IDLE });
        return true;
    },

    // ─── Pointer ───

    pressBlock: (viewKey, blockId, screen) => {
        const { interaction } = get();
        if (interaction.phase === 'dragging') return;

        const alreadySelected =
            interaction.phase === 'selected' &&
            interaction.selection.blockId === blockId &&
            interaction.selection.viewKey === viewKey;

        if (!alreadySelected) {
            get().selectBlock(blockId, viewKey);
            return;
        }

        const { center, draggable } = committedCenter(viewKey, blockId);
        if (!draggable) return;

        const press = useViewStore.getState().getViewport(viewKey).screenToCanvas(screen);
        set({
            interaction: {
                phase: 'dragging',
                selection: interaction.selection,
                grabOffset: { x: press.x - center.x, y: press.y - center.y },
                center,
                origin: center,
            },
            pan: null,
        });
    },

    pressBackground: (viewKey, screen) => {
        if (get().isDragActive()) return;
        get().deselectAll();
        set({ pan: { viewKey, last: screen } });
    },

    movePointer: (viewKey, screen) => {
        const { interaction, pan } = get();

        if (interaction.phase === 'dragging') {
            if (interaction.selection.viewKey !== viewKey) return;
            const pointer = useViewStore.getState().getViewport(viewKey).screenToCanvas(screen);
            const { dragSnap, gridSize } = getEditorConfig();
            let center = {
                x: pointer.x - interaction.grabOffset.x,
                y: pointer.y - interaction.grabOffset.y,
            };
            if (dragSnap) center = snapToGrid(center, gridSize);

            set({ interaction: { ...interaction, center } });
            useViewStore.getState().refreshContent();
            return;
        }

        if (pan && pan.viewKey === viewKey) {
            useViewStore.getState().panBy(viewKey, screen.x - pan.last.x, screen.y - pan.last.y);
            set({ pan: { viewKey, last: screen } });
        }
    },

    release: () => {
        const { interaction } = get();
        set({ pan: null });
        if (interaction.phase !== 'dragging') return;

        const { selection, center, origin } = interaction;
        set({ interaction: { phase: 'selected', selection } });
        // a press and release in place is a click, not a move
        if (samePoint(center, origin)) {
            useViewStore.getState().refreshContent();
            return;
        }

        const logical = useViewStore.getState().getViewport(selection.viewKey).canvasToLogical(center);
        try {
            useProjectStore.getState().setRenderPosition(selection.blockId, logical);
        } finally {
            useViewStore.getState().refreshContent();
        }
    },

    // ─── Drag ───

    isDragActive: () => get().interaction.phase === 'dragging',

    liveOverride: (viewKey) => {
        const { interaction } = get();
        if (interaction.phase !== 'dragging' || interaction.selection.viewKey !== viewKey) return null;

        return { blockId: interaction.selection.blockId, center: interaction.center };
    },

    // ─── Graph / tab changes ───

    handleStructureChange: () => {
        const blockId = get().selectedBlockId();
        if (blockId === null) return;
        if (!useProjectStore.getState().reader().findBlock(blockId)) {
            set({ interaction: IDLE });
        }
    },

    handleTabClosed: (viewKey) => {
        const { interaction, pan } = get();
        if (interaction.phase !== 'idle' && interaction.selection.viewKey === viewKey) {
            set({ interaction: IDLE });
        }
        if (pan?.viewKey === viewKey) set({ pan: null });
    },

    reset: () => set(initialState),
}));
