import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { useProjectStore } from '../../engine/graph/projectStore';
import { useViewStore } from '../../store/viewStore';
import { useInteractionStore } from '../../store/interactionStore';
import { useConnectionStore } from '../../store/connectionStore';
import { blockLabels, buildRenderModel } from './renderModel';

const project = () => useProjectStore.getState();

describe('blockLabels', () => {
    beforeEach(() => {
        project().reset();
    });

    it('shows name and the values a block carries', () => {
        const supply = project().addBlock('supply');
        const conductor = project().addBlock('conductor');
        project().setConductorLength(conductor, 12);
        project().assignEquipment(conductor, 'CAB-1');

        expect(blockLabels(project().getBlock(supply))).toEqual(['Supply 1', '230 V']);
        expect(blockLabels(project().getBlock(conductor))).toEqual(['Conductor 1', 'CAB-1', '12 m']);
    });

    it('shows row protection and rating', () => {
        const location = project().addBlock('location');
        const busbar = project().addBlock('busbar', location);
        const row = project().addBlock('row', busbar);

        expect(blockLabels(project().getBlock(row))).toEqual(['CB 0A']);
        project().setRowProtection(row, 'pin');
        expect(blockLabels(project().getBlock(row))).toEqual(['Pin']);
    });
});

describe('buildRenderModel', () => {
    let supply: number;
    let conductor: number;

    beforeEach(() => {
        vi.useFakeTimers();
        project().reset();
        useViewStore.getState().reset();
        useInteractionStore.getState().reset();
        useConnectionStore.getState().reset();

        supply = project().addBlock('supply');
        conductor = project().addBlock('conductor');
        project().setRenderPosition(conductor, { x: 300, y: 0 });
        project().addConnection(project().getTerminals(supply)[0].id, project().getTerminals(conductor)[0].id);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('routes connections between anchors of the same view', () => {
        const model = buildRenderModel('layout');
        expect(model.routes).toHaveLength(1);
        expect(model.routes[0].points).toEqual([
            { x: 1000, y: 825 },
            { x: 1000, y: 845 },
            { x: 1065, y: 845 },
            { x: 1065, y: 750 },
            { x: 1130, y: 750 },
            { x: 1150, y: 750 },
        ]);
    });

    it('skips connections that cross into another view', () => {
        const location = project().addBlock('location');
        const key = useViewStore.getState().openLocationTab(location);

        expect(buildRenderModel('layout').routes).toHaveLength(1);
        expect(buildRenderModel(key).routes).toHaveLength(0);
    });

    it('reports selection, drag and pending pick for its own view only', () => {
        useInteractionStore.getState().selectBlock(supply, 'layout');
        useInteractionStore.getState().pressBlock('layout', supply, { x: 1000, y: 750 });

        const model = buildRenderModel('layout');
        expect(model.selectedBlockId).toBe(supply);
        expect(model.draggingBlockId).toBe(supply);
        expect(model.showAnchors).toBe(false);

        const location = project().addBlock('location');
        const other = buildRenderModel(`location:${location}`);
        expect(other.selectedBlockId).toBeNull();
        expect(other.scene.items).toHaveLength(0);
    });

    it('shows anchors and the pending terminal in edit mode', () => {
        const terminalId = project().getTerminals(conductor)[1].id;
        useConnectionStore.getState().enterEditMode();
        useConnectionStore.getState().pickAnchor({ blockId: conductor, terminalId }, 'layout');

        const model = buildRenderModel('layout');
        expect(model.showAnchors).toBe(true);
        expect(model.pendingTerminalId).toBe(terminalId);
    });

    it('marks lines removable in remove mode and hides anchors', () => {
        useConnectionStore.getState().enterRemoveMode();

        const model = buildRenderModel('layout');
        expect(model.removeMode).toBe(true);
        expect(model.showAnchors).toBe(false);
    });
});
