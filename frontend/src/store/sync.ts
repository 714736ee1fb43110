/**
 * Store sync — keeps the view, interaction and connection stores in step
 * with the project graph.
 *
 * Structure changes (blocks added or removed, snapshot loaded) close stale
 * tabs, refit the views whose blocks changed, drop a stale selection and a
 * stale pending pick.
 * Connection changes re-render content and then overlays.
 */

import { useProjectStore } from '../engine/graph/projectStore';
import type { ViewKey } from '../canvas/types';
import { useViewStore } from './viewStore';
import { useInteractionStore } from './interactionStore';
import { useConnectionStore } from './connectionStore';

export function connectStores(): () => void {
    const unsubProject = useProjectStore.subscribe((state, prev) => {
        if (state.structureVersion !== prev.structureVersion) {
            useInteractionStore.getState().handleStructureChange();
            useConnectionStore.getState().handleStructureChange();
            useViewStore.getState().handleStructureChange();
        } else if (state.connectionVersion !== prev.connectionVersion) {
            useViewStore.getState().refreshContent();
        }
    });

    const unsubViews = useViewStore.subscribe((state, prev) => {
        if (state.tabs === prev.tabs) return;
        const open = new Set<ViewKey>(state.tabs.map((t) => t.key));
        for (const tab of prev.tabs) {
            if (open.has(tab.key)) continue;
            useInteractionStore.getState().handleTabClosed(tab.key);
            const { pending, cancelPick } = useConnectionStore.getState();
            if (pending?.viewKey === tab.key) cancelPick();
        }
    });

    return () => {
        unsubProject();
        unsubViews();
    };
}
