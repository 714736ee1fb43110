import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { useProjectStore } from '../engine/graph/projectStore';
import { NotFoundError } from '../engine/graph/errors';
import { buildScene } from '../canvas/core/scene';
import type { ViewKey } from '../canvas/types';
import { configureEditor } from '../config/editorConfig';
import { useViewStore } from './viewStore';
import { useInteractionStore } from './interactionStore';

const project = () => useProjectStore.getState();
const views = () => useViewStore.getState();
const interaction = () => useInteractionStore.getState();

function rowAnchorCenters(viewKey: ViewKey, locationId: number, rowIds: number[]): number[] {
    const scene = buildScene(
        project().reader(),
        { kind: 'location', locationId },
        views().getViewport(viewKey),
        interaction().liveOverride(viewKey),
    );
    return scene.anchors.filter((a) => rowIds.includes(a.tag.blockId)).map((a) => a.center.x);
}

describe('interactionStore', () => {
    let location: number;
    let busbar: number;
    let key: ViewKey;

    beforeEach(() => {
        vi.useFakeTimers();
        project().reset();
        views().reset();
        interaction().reset();
        configureEditor({});

        location = project().addBlock('location');
        busbar = project().addBlock('busbar', location);
        project().setRenderPosition(busbar, { x: 0, y: 0 });
        key = views().openLocationTab(location);
    });

    afterEach(() => {
        configureEditor({});
        vi.useRealTimers();
    });

    it('selects on the first press and drags only on the second', () => {
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        expect(interaction().interaction).toEqual({
            phase: 'selected',
            selection: { blockId: busbar, viewKey: key },
        });

        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        const state = interaction().interaction;
        expect(state.phase).toBe('dragging');
        if (state.phase === 'dragging') {
            // busbar centered at canvas (1000, 750)
            expect(state.center).toEqual({ x: 1000, y: 750 });
            expect(state.origin).toEqual({ x: 1000, y: 750 });
            expect(state.grabOffset).toEqual({ x: -100, y: -30 });
        }
        expect(interaction().isDragActive()).toBe(true);
    });

    it('commits a drag of 50 logical units at 200% and moves the rows with it', () => {
        const rows = [project().addBlock('row', busbar), project().addBlock('row', busbar)];
        views().zoomBy(key, 1, { x: 0, y: 0 });
        expect(views().findTab(key)?.transform).toEqual({ x: 0, y: 0, zoom: 2 });

        const before = rowAnchorCenters(key, location, rows);

        // busbar with two rows: canvas top-left (825, 660), 700 x 360 on screen
        interaction().pressBlock(key, busbar, { x: 1700, y: 1340 });
        interaction().pressBlock(key, busbar, { x: 1700, y: 1340 });
        interaction().movePointer(key, { x: 1800, y: 1340 });

        expect(interaction().liveOverride(key)).toEqual({ blockId: busbar, center: { x: 1050, y: 750 } });
        // nothing is committed mid-drag
        expect(project().getBlock(busbar)).toMatchObject({ renderPosition: { x: 0, y: 0 } });
        expect(rowAnchorCenters(key, location, rows)).toEqual(before.map((x) => x + 50));

        interaction().release();
        expect(project().getBlock(busbar)).toMatchObject({ renderPosition: { x: 50, y: 0 } });
        expect(interaction().interaction.phase).toBe('selected');
        expect(interaction().liveOverride(key)).toBeNull();
        expect(rowAnchorCenters(key, location, rows)).toEqual(before.map((x) => x + 50));
    });

    it('moves 50 logical units for 50 pixels at 100%', () => {
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().movePointer(key, { x: 950, y: 770 });
        interaction().release();
        expect(project().getBlock(busbar)).toMatchObject({ renderPosition: { x: 50, y: -50 } });
    });

    it('keeps the grab point under the pointer across a zoom mid-drag', () => {
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        views().zoomBy(key, 1, { x: 0, y: 0 });

        // screen (2000, 1500) is canvas (1000, 750) at 200%
        interaction().movePointer(key, { x: 2000, y: 1500 });
        expect(interaction().liveOverride(key)?.center).toEqual({ x: 1100, y: 780 });

        interaction().release();
        expect(project().getBlock(busbar)).toMatchObject({ renderPosition: { x: 100, y: -30 } });
    });

    it('commits nothing when a drag ends where it started', () => {
        const load = project().addBlock('load', location);
        project().markSaved();
        const { version } = project();

        interaction().pressBlock(key, load, { x: 1000, y: 750 });
        interaction().pressBlock(key, load, { x: 1000, y: 750 });
        interaction().release();

        expect(interaction().interaction).toEqual({
            phase: 'selected',
            selection: { blockId: load, viewKey: key },
        });
        expect(project().getBlock(load)).toMatchObject({ renderPosition: null });
        expect(project().version).toBe(version);
        expect(project().isModified).toBe(false);
    });

    it('snaps the dragged center to the grid when enabled', () => {
        configureEditor({ dragSnap: true });
        interaction().pressBlock(key, busbar, { x: 830, y: 720 });
        interaction().pressBlock(key, busbar, { x: 830, y: 720 });
        // raw center (1013, 757) snaps to (1020, 760)
        interaction().movePointer(key, { x: 843, y: 727 });

        expect(interaction().liveOverride(key)).toEqual({ blockId: busbar, center: { x: 1020, y: 760 } });
        interaction().release();
        expect(project().getBlock(busbar)).toMatchObject({ renderPosition: { x: 20, y: -10 } });
    });

    it('ignores moves from another view while dragging', () => {
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().movePointer('layout', { x: 1200, y: 720 });
        expect(interaction().liveOverride(key)?.center).toEqual({ x: 1000, y: 750 });
    });

    it('selects rows but never drags them', () => {
        const row = project().addBlock('row', busbar);
        interaction().pressBlock(key, row, { x: 1000, y: 745 });
        interaction().pressBlock(key, row, { x: 1000, y: 745 });
        expect(interaction().interaction).toEqual({
            phase: 'selected',
            selection: { blockId: row, viewKey: key },
        });
    });

    it('ignores other presses while a drag is active', () => {
        const load = project().addBlock('load', location);
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });
        interaction().pressBlock(key, busbar, { x: 900, y: 720 });

        interaction().pressBlock(key, load, { x: 1000, y: 750 });
        interaction().pressBackground(key, { x: 10, y: 10 });
        expect(interaction().interaction.phase).toBe('dragging');
        expect(interaction().pan).toBeNull();
    });

    it('deselects and pans on a background press', () => {
        interaction().selectBlock(busbar, key);
        interaction().pressBackground(key, { x: 100, y: 100 });
        expect(interaction().interaction).toEqual({ phase: 'idle' });

        interaction().movePointer(key, { x: 130, y: 90 });
        interaction().movePointer(key, { x: 140, y: 90 });
        expect(views().findTab(key)?.transform).toEqual({ x: 40, y: -10, zoom: 1 });

        interaction().release();
        interaction().movePointer(key, { x: 500, y: 500 });
        expect(views().findTab(key)?.transform).toEqual({ x: 40, y: -10, zoom: 1 });
    });

    it('rejects programmatic selection of unknown blocks', () => {
        expect(() => interaction().selectBlock(404)).toThrow(NotFoundError);
    });

    it('defaults programmatic selection to the active view', () => {
        interaction().selectBlock(busbar);
        expect(interaction().interaction).toEqual({
            phase: 'selected',
            selection: { blockId: busbar, viewKey: key },
        });
    });

    it('deletes the selection with its subtree', () => {
        const row = project().addBlock('row', busbar);
        interaction().selectBlock(busbar, key);

        expect(interaction().deleteSelection()).toBe(true);
        expect(interaction().interaction).toEqual({ phase: 'idle' });
        expect(() => project().getBlock(row)).toThrow(NotFoundError);
    });

    it('refuses to delete an external busbar', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const eb = project().getChildren(location).find((b) => b.kind === 'externalBusbar');
        expect(eb).toBeDefined();
        if (!eb) return;

        interaction().selectBlock(eb.id, key);
        expect(interaction().deleteSelection()).toBe(false);
        expect(interaction().interaction.phase).toBe('selected');
        expect(warn).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    it('drops a selection whose block disappeared or whose tab closed', () => {
        interaction().selectBlock(busbar, key);
        interaction().handleTabClosed(key);
        expect(interaction().interaction).toEqual({ phase: 'idle' });

        interaction().selectBlock(busbar, key);
        project().removeBlock(busbar);
        interaction().handleStructureChange();
        expect(interaction().interaction).toEqual({ phase: 'idle' });
    });
});
