import { describe, it, expect, beforeEach } from 'vitest';
import { useProjectStore } from '../../engine/graph/projectStore';
import { createGraphReader } from '../../engine/graph/queries';
import { layoutToCanvas } from '../core/coordinates';
import { DOT_OFFSET } from '../types';
import { toInteractive } from './adapters';

const store = () => useProjectStore.getState();
const interactive = (id: number) => toInteractive(store().getBlock(id), store().reader());

describe('block adapters', () => {
    beforeEach(() => {
        store().reset();
    });

    it('reports the preferred view per kind', () => {
        const location = store().addBlock('location');
        const load = store().addBlock('load', location);
        const eb = store().getChildren(location)[0].id;

        expect(interactive(location).preferredView()).toBe('layout');
        expect(interactive(load).preferredView()).toBe('location');
        expect(interactive(eb).preferredView()).toBe('location');
    });

    it('places the eight location anchors on the thirds of each edge', () => {
        const location = store().addBlock('location');
        const anchors = interactive(location).connectionAnchors(DOT_OFFSET);
        const terminals = store().getTerminals(location);

        expect(anchors).toHaveLength(8);
        expect(anchors.map((a) => a.terminalId)).toEqual(terminals.map((t) => t.id));
        expect(anchors.map((a) => a.side)).toEqual([
            'top', 'top', 'right', 'right', 'bottom', 'bottom', 'left', 'left',
        ]);
        // top-left third of the top edge, minus the dot offset
        expect(anchors[0].relX).toBeCloseTo(200 / 3 - 100 - 6);
        expect(anchors[0].relY).toBe(-106);
        expect(anchors[2].relX).toBe(94);
        expect(anchors[2].relY).toBeCloseTo(200 / 3 - 100 - 6);
        expect(anchors[0].tag).toEqual({ blockId: location, terminalId: terminals[0].id });
    });

    it('puts single-terminal sources on the bottom center', () => {
        const supply = store().addBlock('supply');
        const [anchor] = interactive(supply).connectionAnchors(DOT_OFFSET);
        expect(anchor.relX).toBe(-6);
        expect(anchor.relY).toBe(69);
        expect(interactive(supply).renderFootprint()).toEqual({ width: 150, height: 150 });
    });

    it('anchors conductors and transformers on both ends', () => {
        const location = store().addBlock('location');
        const conductor = store().addBlock('conductor');
        const tx = store().addBlock('transformerUps', location);

        expect(interactive(conductor).connectionAnchors(0).map((a) => [a.relX, a.relY])).toEqual([
            [-150, 0],
            [150, 0],
        ]);
        expect(interactive(tx).connectionAnchors(0).map((a) => a.relX)).toEqual([-85, 85]);
        expect(interactive(tx).renderFootprint()).toEqual({ width: 170, height: 100 });
    });

    it('lines the external busbar anchors up with its rows', () => {
        const location = store().addBlock('location');
        const eb = store().getChildren(location)[0].id;
        const anchors = interactive(eb).connectionAnchors(DOT_OFFSET);

        expect(anchors).toHaveLength(8);
        expect(anchors[0]).toMatchObject({ relX: 64, relY: -181, side: 'right' });
        expect(anchors[7]).toMatchObject({ relX: 64, relY: 169 });
    });

    it('gives an external busbar without exactly eight terminals no anchors', () => {
        const location = store().addBlock('location');
        const eb = store().getChildren(location)[0];
        const state = store();
        const terminals = { ...state.terminals };
        const first = store().getTerminals(eb.id)[0];
        delete terminals[first.id];

        const reader = createGraphReader({ ...state, terminals });
        expect(toInteractive(eb, reader).connectionAnchors(DOT_OFFSET)).toEqual([]);
    });

    it('grows the busbar with its rows', () => {
        const location = store().addBlock('location');
        const busbar = store().addBlock('busbar', location);
        expect(interactive(busbar).renderFootprint().height).toBe(80);
        store().addBlock('row', busbar);
        store().addBlock('row', busbar);
        expect(interactive(busbar).renderFootprint()).toEqual({ width: 350, height: 180 });
        expect(interactive(busbar).connectionAnchors(DOT_OFFSET)).toEqual([]);
    });

    it('derives row centers from the busbar, following a live drag', () => {
        const location = store().addBlock('location');
        const busbar = store().addBlock('busbar', location);
        const r0 = store().addBlock('row', busbar);
        const r1 = store().addBlock('row', busbar);

        // busbar at the origin: center (1000, 750), height 180, top 660
        expect(interactive(r0).canvasCenter(layoutToCanvas, null)).toEqual({ x: 1000, y: 720 });
        expect(interactive(r1).canvasCenter(layoutToCanvas, null)).toEqual({ x: 1000, y: 770 });

        const live = { blockId: busbar, center: { x: 1050, y: 800 } };
        expect(interactive(r0).canvasCenter(layoutToCanvas, live)).toEqual({ x: 1050, y: 770 });
        expect(interactive(r0).isDraggable()).toBe(false);
        expect(interactive(r0).logicalPosition()).toBeNull();
    });

    it('uses the stored position, or the origin while unplaced', () => {
        const supply = store().addBlock('supply');
        expect(interactive(supply).canvasCenter(layoutToCanvas, null)).toEqual({ x: 1000, y: 750 });
        store().setRenderPosition(supply, { x: -200, y: 100 });
        expect(interactive(supply).logicalPosition()).toEqual({ x: -200, y: 100 });
        expect(interactive(supply).canvasCenter(layoutToCanvas, null)).toEqual({ x: 800, y: 650 });
    });
});
