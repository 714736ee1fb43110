import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { useProjectStore } from '../engine/graph/projectStore';
import { InvalidBlockError, NotFoundError } from '../engine/graph/errors';
import { LayoutPass } from '../canvas/core/LayoutPass';
import { useViewStore } from './viewStore';

const project = () => useProjectStore.getState();
const views = () => useViewStore.getState();
const VIEWPORT = { width: 800, height: 600 };

describe('viewStore tabs', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        project().reset();
        views().reset();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('starts with the layout tab active and waiting for a fit', () => {
        expect(views().tabs.map((t) => t.key)).toEqual(['layout']);
        expect(views().activeKey).toBe('layout');
        expect(views().tabs[0].pendingFit).toBe(true);
    });

    it('fits the layout tab once its viewport is measured', () => {
        views().setViewportSize('layout', VIEWPORT);
        const tab = views().findTab('layout');
        expect(tab?.transform).toEqual({ x: -600, y: -450, zoom: 1 });
        expect(tab?.pendingFit).toBe(false);
    });

    it('defers the first fit of a location tab until the viewport is known', () => {
        const location = project().addBlock('location');
        const key = views().openLocationTab(location);

        expect(key).toBe(`location:${location}`);
        expect(views().activeKey).toBe(key);
        expect(views().findTab(key)?.transform).toEqual({ x: 0, y: 0, zoom: 1 });

        // the layout pass fires before the canvas has been measured
        vi.runAllTimers();
        expect(views().findTab(key)?.pendingFit).toBe(true);

        // external busbar alone at the origin: 140 x 400 padded to 168 x 480
        views().setViewportSize(key, VIEWPORT);
        expect(views().findTab(key)?.transform).toEqual({ x: -850, y: -637.5, zoom: 1.25 });
        expect(views().findTab(key)?.pendingFit).toBe(false);
    });

    it('runs the deferred fit when the viewport was measured first', () => {
        const location = project().addBlock('location');
        const key = views().openLocationTab(location);
        views().setViewportSize(key, VIEWPORT);
        const fitted = views().findTab(key)?.transform;

        vi.runAllTimers();
        expect(views().findTab(key)?.transform).toEqual(fitted);
    });

    it('focuses an already open tab instead of opening another', () => {
        const location = project().addBlock('location');
        const key = views().openLocationTab(location);
        views().activate('layout');
        expect(views().openLocationTab(location)).toBe(key);
        expect(views().tabs).toHaveLength(2);
        expect(views().activeKey).toBe(key);
    });

    it('only opens tabs for locations', () => {
        const supply = project().addBlock('supply');
        expect(() => views().openLocationTab(supply)).toThrow(InvalidBlockError);
        expect(() => views().openLocationTab(404)).toThrow(NotFoundError);
    });

    it('selects the previous tab when the active one closes', () => {
        const a = project().addBlock('location');
        const b = project().addBlock('location');
        const keyA = views().openLocationTab(a);
        const keyB = views().openLocationTab(b);

        expect(views().closeTab(keyB)).toBe(true);
        expect(views().activeKey).toBe(keyA);
        expect(views().closeTab(keyA)).toBe(true);
        expect(views().activeKey).toBe('layout');
    });

    it('never closes the layout tab', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(views().closeTab('layout')).toBe(false);
        expect(views().tabs).toHaveLength(1);
        expect(warn).toHaveBeenCalledWith('[Views] The layout tab cannot be closed');
        warn.mockRestore();
    });

    it('closes the tab of a removed location and refits the rest', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        views().setViewportSize('layout', VIEWPORT);
        const location = project().addBlock('location');
        const key = views().openLocationTab(location);

        project().removeBlock(location);
        views().handleStructureChange();

        expect(views().findTab(key)).toBeNull();
        expect(views().activeKey).toBe('layout');
        expect(views().findTab('layout')?.transform).toEqual({ x: -600, y: -450, zoom: 1 });
        vi.restoreAllMocks();
    });
});

describe('viewStore transforms', () => {
    beforeEach(() => {
        project().reset();
        views().reset();
        views().setViewportSize('layout', VIEWPORT);
    });

    it('zooms in around the viewport center by one step', () => {
        views().zoomIn('layout');
        const t = views().findTab('layout')?.transform;
        expect(t?.zoom).toBeCloseTo(1.1, 12);
        expect(t?.x).toBeCloseTo(-700, 9);
        expect(t?.y).toBeCloseTo(-525, 9);
    });

    it('zooms around an explicit pivot', () => {
        views().zoomBy('layout', 1, { x: 0, y: 0 });
        expect(views().findTab('layout')?.transform).toEqual({ x: -1200, y: -900, zoom: 2 });
    });

    it('pans by screen pixels', () => {
        views().panBy('layout', 25, -10);
        expect(views().findTab('layout')?.transform).toEqual({ x: -575, y: -460, zoom: 1 });
    });

    it('refreshes content before overlays', () => {
        const seen: string[] = [];
        const unsub = useViewStore.subscribe((s, prev) => {
            if (s.contentRevision !== prev.contentRevision) seen.push('content');
            if (s.overlayRevision !== prev.overlayRevision) seen.push('overlay');
        });
        views().refreshContent();
        unsub();
        expect(seen).toEqual(['content', 'overlay']);
    });
});

describe('LayoutPass', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs only the most recent request', () => {
        const pass = new LayoutPass();
        const first = vi.fn();
        const second = vi.fn();

        pass.request(first);
        pass.request(second);
        expect(pass.isPending).toBe(true);
        vi.runAllTimers();

        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
        expect(pass.isPending).toBe(false);
    });

    it('can be cancelled', () => {
        const pass = new LayoutPass();
        const task = vi.fn();
        pass.request(task);
        pass.cancel();
        vi.runAllTimers();
        expect(task).not.toHaveBeenCalled();
    });
});
