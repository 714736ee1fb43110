import { create } from 'zustand';
import { produce } from 'immer';

import { useProjectStore } from '../engine/graph/projectStore';
import { InvalidBlockError, ViewNotReadyError } from '../engine/graph/errors';
import type { Position, Size, ViewKey, ViewSubject } from '../canvas/types';
import { LAYOUT_VIEW_KEY, viewKeyFor } from '../canvas/types';
import { Viewport } from '../canvas/core/Viewport';
import type { ViewportState } from '../canvas/core/Viewport';
import { LayoutPass } from '../canvas/core/LayoutPass';
import { fitView } from '../canvas/layout/fitToContent';
import { viewContentKey } from '../canvas/core/scene';
import { getEditorConfig } from '../config/editorConfig';

/* ─── State Shape ─── */

export interface ViewTab {
    key: ViewKey;
    subject: ViewSubject;
    transform: ViewportState;
    /** Measured viewport in screen pixels; null until the first layout pass */
    viewportSize: Size | null;
    /** A fit was requested before the viewport could be measured */
    pendingFit: boolean;
    /** Blocks shown when the tab was last refit for a structure change */
    contentKey: string;
}

interface ViewState {
    /** Layout tab first, then location tabs in opening order */
    tabs: ViewTab[];
    activeKey: ViewKey;

    // Re-render triggers: content (blocks) always precedes overlays (anchors, lines)
    contentRevision: number;
    overlayRevision: number;
}

interface ViewActions {
    // ─── Tabs ───
    /** Open (or focus) the tab of a location; its first fit runs after layout */
    openLocationTab: (locationId: number) => ViewKey;
    closeTab: (key: ViewKey) => boolean;
    activate: (key: ViewKey) => void;
    findTab: (key: ViewKey) => ViewTab | null;
    getViewport: (key: ViewKey) => Viewport;

    // ─── Viewport ───
    setViewportSize: (key: ViewKey, size: Size) => void;
    zoomBy: (key: ViewKey, delta: number, pivot?: Position) => void;
    zoomIn: (key: ViewKey) => void;
    zoomOut: (key: ViewKey) => void;
    panBy: (key: ViewKey, dx: number, dy: number) => void;
    fitToContent: (key: ViewKey) => boolean;

    // ─── Refresh ───
    refreshContent: () => void;
    refreshOverlays: () => void;
    /** React to blocks being added or removed; refits only the views whose blocks changed */
    handleStructureChange: () => void;

    reset: () => void;
}

export type ViewStore = ViewState & ViewActions;

/* ─── Initial State ─── */

const IDENTITY: ViewportState = { x: 0, y: 0, zoom: 1 };

function createTab(subject: ViewSubject, contentKey = ''): ViewTab {
    return {
        key: viewKeyFor(subject),
        subject,
        transform: IDENTITY,
        viewportSize: null,
        pendingFit: true,
        contentKey,
    };
}

const initialState: ViewState = {
    tabs: [createTab({ kind: 'layout' })],
    activeKey: LAYOUT_VIEW_KEY,
    contentRevision: 0,
    overlayRevision: 0,
};

/* ─── Deferred fits ─── */

const layoutPasses = new Map<ViewKey, LayoutPass>();

function layoutPassFor(key: ViewKey): LayoutPass {
    let pass = layoutPasses.get(key);
    if (!pass) {
        pass = new LayoutPass();
        layoutPasses.set(key, pass);
    }
    return pass;
}

function dropLayoutPass(key: ViewKey): void {
    layoutPasses.get(key)?.cancel();
    layoutPasses.delete(key);
}

/* ─── Store ─── */

export const useViewStore = create<ViewStore>((set, get) => {
    const updateTab = (key: ViewKey, recipe: (tab: ViewTab) => void) =>
        set(
            produce((draft: ViewState) => {
                const tab = draft.tabs.find((t) => t.key === key);
                if (tab) recipe(tab);
            }),
        );

    const removeTab = (key: ViewKey) => {
        const { tabs, activeKey } = get();
        const index = tabs.findIndex((t) => t.key === key);
        if (index < 0) return;

        dropLayoutPass(key);
        const remaining = tabs.filter((t) => t.key !== key);
        const nextActive = activeKey === key ? remaining[Math.max(0, index - 1)].key : activeKey;
        set({ tabs: remaining, activeKey: nextActive });
    };

    return {
        ...initialState,

        // ─── Tabs ───

        openLocationTab: (locationId) => {
            const block = useProjectStore.getState().getBlock(locationId);
            if (block.kind !== 'location') {
                throw new InvalidBlockError(`Block ${locationId} is not a location`);
            }

            const subject: ViewSubject = { kind: 'location', locationId };
            const key = viewKeyFor(subject);
            if (!get().findTab(key)) {
                const contentKey = viewContentKey(useProjectStore.getState().reader(), subject);
                set((s) => ({ tabs: [...s.tabs, createTab(subject, contentKey)] }));
                layoutPassFor(key).request(() => {
                    get().fitToContent(key);
                });
            }
            set({ activeKey: key });
            return key;
        },

        closeTab: (key) => {
            if (key === LAYOUT_VIEW_KEY) {
                console.warn('[Views] The layout tab cannot be closed');
                return false;
            }
            if (!get().findTab(key)) return false;
            removeTab(key);
            return true;
        },

        activate: (key) => {
            if (get().findTab(key)) set({ activeKey: key });
        },

        findTab: (key) => get().tabs.find((t) => t.key === key) ?? null,

        getViewport: (key) => {
            const config = getEditorConfig();
            const tab = get().findTab(key);
            return new Viewport(tab?.transform ?? IDENTITY, {
                min: config.zoomMin,
                max: config.zoomMax,
            });
        },

        // ─── Viewport ───

        setViewportSize: (key, size) => {
            const tab = get().findTab(key);
            if (!tab) return;
            const changed =
                !tab.viewportSize ||
                tab.viewportSize.width !== size.width ||
                tab.viewportSize.height !== size.height;
            if (changed) {
                updateTab(key, (t) => {
                    t.viewportSize = { width: size.width, height: size.height };
                });
            }
            if (tab.pendingFit) get().fitToContent(key);
        },

        zoomBy: (key, delta, pivot) => {
            const tab = get().findTab(key);
            if (!tab) return;
            const viewport = get().getViewport(key);
            const size = tab.viewportSize ?? { width: 0, height: 0 };
            const center = pivot ?? { x: size.width / 2, y: size.height / 2 };
            if (viewport.zoomBy(delta, center)) {
                updateTab(key, (t) => {
                    t.transform = viewport.toState();
                });
            }
        },

        zoomIn: (key) => get().zoomBy(key, getEditorConfig().zoomStep),

        zoomOut: (key) => get().zoomBy(key, -getEditorConfig().zoomStep),

        panBy: (key, dx, dy) => {
            if (dx === 0 && dy === 0) return;
            const viewport = get().getViewport(key);
            viewport.pan(dx, dy);
            updateTab(key, (t) => {
                t.transform = viewport.toState();
            });
        },

        fitToContent: (key) => {
            const tab = get().findTab(key);
            if (!tab) return false;

            try {
                const transform = fitView(
                    key,
                    useProjectStore.getState().reader(),
                    tab.subject,
                    get().getViewport(key),
                    tab.viewportSize,
                );
                updateTab(key, (t) => {
                    t.transform = transform;
                    t.pendingFit = false;
                });
                return true;
            } catch (err) {
                if (err instanceof ViewNotReadyError) {
                    updateTab(key, (t) => {
                        t.pendingFit = true;
                    });
                    return false;
                }
                throw err;
            }
        },

        // ─── Refresh ───

        refreshContent: () => {
            set((s) => ({ contentRevision: s.contentRevision + 1 }));
            set((s) => ({ overlayRevision: s.overlayRevision + 1 }));
        },

        refreshOverlays: () => set((s) => ({ overlayRevision: s.overlayRevision + 1 })),

        handleStructureChange: () => {
            const project = useProjectStore.getState();

            for (const tab of get().tabs) {
                if (tab.subject.kind !== 'location') continue;
                const block = project.reader().findBlock(tab.subject.locationId);
                if (!block || block.kind !== 'location') {
                    console.info(`[Views] Closing ${tab.key}: location was removed`);
                    removeTab(tab.key);
                }
            }

            const graph = project.reader();
            for (const tab of get().tabs) {
                const contentKey = viewContentKey(graph, tab.subject);
                if (contentKey === tab.contentKey) continue;
                updateTab(tab.key, (t) => {
                    t.contentKey = contentKey;
                });
                get().fitToContent(tab.key);
            }
            get().refreshContent();
        },

        reset: () => {
            for (const key of [...layoutPasses.keys()]) dropLayoutPass(key);
            set(initialState);
        },
    };
});
