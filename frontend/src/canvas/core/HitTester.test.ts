import { describe, it, expect, beforeEach } from 'vitest';
import { useProjectStore } from '../../engine/graph/projectStore';
import { HitTester } from './HitTester';
import { buildScene, homeView, routeSceneConnections } from './scene';
import { Viewport } from './Viewport';

const store = () => useProjectStore.getState();

describe('scene', () => {
    beforeEach(() => {
        store().reset();
    });

    it('resolves the view each block is edited in', () => {
        const location = store().addBlock('location');
        const busbar = store().addBlock('busbar', location);
        const row = store().addBlock('row', busbar);
        const supply = store().addBlock('supply');

        expect(homeView(store().reader(), supply)).toEqual({ kind: 'layout' });
        expect(homeView(store().reader(), location)).toEqual({ kind: 'layout' });
        expect(homeView(store().reader(), busbar)).toEqual({ kind: 'location', locationId: location });
        expect(homeView(store().reader(), row)).toEqual({ kind: 'location', locationId: location });
    });

    it('renders only root blocks in the layout view', () => {
        const location = store().addBlock('location');
        store().addBlock('load', location);
        const supply = store().addBlock('supply');

        const scene = buildScene(store().reader(), { kind: 'layout' }, new Viewport());
        expect(scene.items.map((i) => i.interactive.block.id)).toEqual([location, supply]);
        // eight location anchors plus the supply output
        expect(scene.anchors).toHaveLength(9);
    });

    it('renders a location view with nested rows after their busbar', () => {
        const location = store().addBlock('location');
        const busbar = store().addBlock('busbar', location);
        const row = store().addBlock('row', busbar);
        const eb = store().getChildren(location)[0].id;

        const scene = buildScene(store().reader(), { kind: 'location', locationId: location }, new Viewport());
        expect(scene.items.map((i) => [i.interactive.block.id, i.nested])).toEqual([
            [eb, false],
            [busbar, false],
            [row, true],
        ]);
        // eight external busbar anchors plus two row anchors
        expect(scene.anchors).toHaveLength(10);
    });

    it('moves anchors with a live drag', () => {
        const supply = store().addBlock('supply');
        const live = { blockId: supply, center: { x: 1100, y: 750 } };
        const scene = buildScene(store().reader(), { kind: 'layout' }, new Viewport(), live);
        expect(scene.anchors[0].topLeft).toEqual({ x: 1094, y: 819 });
        expect(scene.anchors[0].center).toEqual({ x: 1100, y: 825 });
    });
});

describe('HitTester', () => {
    let location: number;
    let busbar: number;
    let row: number;
    const hitTester = new HitTester();

    beforeEach(() => {
        store().reset();
        location = store().addBlock('location');
        busbar = store().addBlock('busbar', location);
        row = store().addBlock('row', busbar);
        store().setRenderPosition(store().getChildren(location)[0].id, { x: -400, y: 300 });
        hitTester.setScene(
            buildScene(store().reader(), { kind: 'location', locationId: location }, new Viewport()),
        );
    });

    it('prefers the row drawn over its busbar', () => {
        // busbar (1 row) at the origin: top 685, row center y 745
        expect(hitTester.hitTestBlock({ x: 1000, y: 745 })?.blockId).toBe(row);
        expect(hitTester.hitTestBlock({ x: 1000, y: 700 })?.blockId).toBe(busbar);
        expect(hitTester.hitTestBlock({ x: 10, y: 10 })).toBeNull();
    });

    it('tests anchors only when asked and scales the radius by zoom', () => {
        const viewport = new Viewport({ x: 0, y: 0, zoom: 2 });
        // right row anchor center at canvas (1175, 745) → screen (2350, 1490)
        const screen = { x: 2356, y: 1490 };

        const withAnchors = hitTester.hitTestScreen(screen, viewport, { anchors: true });
        expect(withAnchors?.kind).toBe('anchor');
        if (withAnchors?.kind === 'anchor') {
            expect(withAnchors.anchor.tag.blockId).toBe(row);
            expect(withAnchors.distance).toBe(3);
        }

        const without = hitTester.hitTestScreen(screen, viewport, { anchors: false });
        expect(without).toBeNull();
    });
});

describe('HitTester connection lines', () => {
    const hitTester = new HitTester();
    let supply: number;

    beforeEach(() => {
        store().reset();
        supply = store().addBlock('supply');
        const conductor = store().addBlock('conductor');
        store().setRenderPosition(conductor, { x: 300, y: 0 });
        store().addConnection(store().getTerminals(supply)[0].id, store().getTerminals(conductor)[0].id);

        const scene = buildScene(store().reader(), { kind: 'layout' }, new Viewport());
        // route runs (1000, 825) → (1000, 845) → (1065, 845) → (1065, 750) → (1150, 750)
        hitTester.setScene(scene, routeSceneConnections(scene, store().reader().getAllConnections()));
    });

    it('finds the nearest segment within the tolerance', () => {
        const hit = hitTester.hitTestConnection({ x: 1030, y: 848 }, 6);
        expect(hit?.distance).toBe(3);
        expect(hit?.connection.leftId).toBe(store().getTerminals(supply)[0].id);
        expect(hitTester.hitTestConnection({ x: 1030, y: 860 }, 6)).toBeNull();
    });

    it('tests lines only when asked and scales the tolerance by zoom', () => {
        const viewport = new Viewport({ x: 0, y: 0, zoom: 2 });

        // canvas (1030, 848): 3 units off the line, at the 6 px / 200% limit
        expect(hitTester.hitTestScreen({ x: 2060, y: 1696 }, viewport, { anchors: false, connections: true })?.kind).toBe(
            'connection',
        );
        expect(hitTester.hitTestScreen({ x: 2060, y: 1698 }, viewport, { anchors: false, connections: true })).toBeNull();
        expect(hitTester.hitTestScreen({ x: 2060, y: 1696 }, viewport, { anchors: false })).toBeNull();
    });

    it('still hits blocks away from the lines', () => {
        const hit = hitTester.hitTestScreen({ x: 1000, y: 750 }, new Viewport(), { anchors: false, connections: true });
        expect(hit?.kind).toBe('block');
    });
});
