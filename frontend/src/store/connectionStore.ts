import { create } from 'zustand';

import { useProjectStore } from '../engine/graph/projectStore';
import { InvalidConnectionError, NotFoundError } from '../engine/graph/errors';
import type { Connection } from '../engine/graph/models';
import type { AnchorTag, ViewKey } from '../canvas/types';
import { useViewStore } from './viewStore';
import { useInteractionStore } from './interactionStore';

/* ─── State Shape ─── */

export interface PendingPick {
    terminalId: number;
    blockId: number;
    viewKey: ViewKey;
}

export type PickOutcome = 'ignored' | 'picked' | 'cancelled' | 'connected' | 'failed';

interface ConnectionState {
    /** Anchors are shown and hit-tested only in edit mode */
    editMode: boolean;
    /** Lines are hit-tested and removed on click; exclusive with edit mode */
    removeMode: boolean;
    /** First terminal of a two-click connection */
    pending: PendingPick | null;
    /** Last rejected connection, until dismissed */
    error: string | null;
}

interface ConnectionActions {
    enterEditMode: () => void;
    exitEditMode: () => void;
    toggleEditMode: () => void;
    enterRemoveMode: () => void;
    exitRemoveMode: () => void;
    toggleRemoveMode: () => void;

    pickAnchor: (tag: AnchorTag, viewKey: ViewKey) => PickOutcome;
    cancelPick: () => void;
    /** Delete a clicked line; false outside remove mode or when it is already gone */
    removeLine: (connection: Connection) => boolean;
    dismissError: () => void;

    /** Drop a pick whose terminal no longer exists */
    handleStructureChange: () => void;

    reset: () => void;
}

export type ConnectionStore = ConnectionState & ConnectionActions;

const initialState: ConnectionState = {
    editMode: false,
    removeMode: false,
    pending: null,
    error: null,
};

/* ─── Store ─── */

export const useConnectionStore = create<ConnectionStore>((set, get) => ({
    ...initialState,

    enterEditMode: () => {
        useInteractionStore.getState().deselectAll();
        set({ editMode: true, removeMode: false, pending: null });
        useViewStore.getState().refreshOverlays();
    },

    exitEditMode: () => {
        set({ editMode: false, pending: null });
        useViewStore.getState().refreshOverlays();
    },

    toggleEditMode: () => {
        if (get().editMode) get().exitEditMode();
        else get().enterEditMode();
    },

    enterRemoveMode: () => {
        useInteractionStore.getState().deselectAll();
        set({ removeMode: true, editMode: false, pending: null });
        useViewStore.getState().refreshOverlays();
    },

    exitRemoveMode: () => {
        set({ removeMode: false });
        useViewStore.getState().refreshOverlays();
    },

    toggleRemoveMode: () => {
        if (get().removeMode) get().exitRemoveMode();
        else get().enterRemoveMode();
    },

    pickAnchor: (tag, viewKey) => {
        if (!get().editMode) return 'ignored';
        const { pending } = get();

        if (!pending) {
            set({ pending: { terminalId: tag.terminalId, blockId: tag.blockId, viewKey } });
            useViewStore.getState().refreshOverlays();
            return 'picked';
        }

        if (pending.terminalId === tag.terminalId) {
            get().cancelPick();
            return 'cancelled';
        }

        try {
            useProjectStore.getState().addConnection(pending.terminalId, tag.terminalId);
        } catch (err) {
            if (!(err instanceof InvalidConnectionError)) throw err;
            console.warn(`[Connections] ${err.message}`);
            set({ pending: null, error: err.message });
            useViewStore.getState().refreshOverlays();
            return 'failed';
        }

        console.info(`[Connections] Connected terminal ${pending.terminalId} to ${tag.terminalId}`);
        set({ pending: null, error: null });
        useViewStore.getState().refreshContent();
        return 'connected';
    },

    cancelPick: () => {
        if (!get().pending) return;
        set({ pending: null });
        useViewStore.getState().refreshOverlays();
    },

    removeLine: (connection) => {
        if (!get().removeMode) return false;
        const { leftId, rightId } = connection;

        try {
            useProjectStore.getState().removeConnection(leftId, rightId);
        } catch (err) {
            if (!(err instanceof NotFoundError)) throw err;
            console.warn(`[Connections] ${err.message}`);
            return false;
        }

        console.info(`[Connections] Removed connection ${leftId}-${rightId}`);
        set({ error: null });
        useViewStore.getState().refreshContent();
        return true;
    },

    dismissError: () => set({ error: null }),

    handleStructureChange: () => {
        const { pending } = get();
        if (!pending) return;
        if (!useProjectStore.getState().terminals[pending.terminalId]) {
            get().cancelPick();
        }
    },

    reset: () => set(initialState),
}));
