import { describe, it, expect, beforeEach, vi } from 'vitest';
import { useProjectStore } from '../engine/graph/projectStore';
import type { AnchorTag } from '../canvas/types';
import { useViewStore } from './viewStore';
import { useInteractionStore } from './interactionStore';
import { useConnectionStore } from './connectionStore';

const project = () => useProjectStore.getState();
const connections = () => useConnectionStore.getState();

function anchorOf(blockId: number, index = 0): AnchorTag {
    return { blockId, terminalId: project().getTerminals(blockId)[index].id };
}

describe('connectionStore', () => {
    let supply: number;
    let conductor: number;

    beforeEach(() => {
        project().reset();
        useViewStore.getState().reset();
        useInteractionStore.getState().reset();
        connections().reset();

        supply = project().addBlock('supply');
        conductor = project().addBlock('conductor');
    });

    it('ignores anchor picks outside edit mode', () => {
        expect(connections().pickAnchor(anchorOf(supply), 'layout')).toBe('ignored');
        expect(connections().pending).toBeNull();
    });

    it('clears the selection when entering edit mode', () => {
        useInteractionStore.getState().selectBlock(supply, 'layout');
        connections().enterEditMode();
        expect(connections().editMode).toBe(true);
        expect(useInteractionStore.getState().interaction).toEqual({ phase: 'idle' });
    });

    it('connects two terminals with two picks', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const first = anchorOf(supply);
        const second = anchorOf(conductor);
        connections().enterEditMode();

        expect(connections().pickAnchor(first, 'layout')).toBe('picked');
        expect(connections().pending).toEqual({ terminalId: first.terminalId, blockId: supply, viewKey: 'layout' });

        const seen: string[] = [];
        const unsub = useViewStore.subscribe((s, prev) => {
            if (s.contentRevision !== prev.contentRevision) seen.push('content');
            if (s.overlayRevision !== prev.overlayRevision) seen.push('overlay');
        });
        expect(connections().pickAnchor(second, 'layout')).toBe('connected');
        unsub();

        expect(seen).toEqual(['content', 'overlay']);
        expect(connections().pending).toBeNull();
        expect(project().getConnections(second.terminalId)).toEqual([
            { leftId: first.terminalId, rightId: second.terminalId },
        ]);
        expect(project().isModified).toBe(true);
        vi.restoreAllMocks();
    });

    it('cancels when the same terminal is picked twice', () => {
        const tag = anchorOf(conductor, 1);
        connections().enterEditMode();
        connections().pickAnchor(tag, 'layout');
        expect(connections().pickAnchor(tag, 'layout')).toBe('cancelled');
        expect(connections().pending).toBeNull();
        expect(project().connections).toHaveLength(0);
    });

    it('reports a duplicate connection and leaves the graph alone', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const a = anchorOf(supply);
        const b = anchorOf(conductor);
        project().addConnection(a.terminalId, b.terminalId);
        const version = project().version;

        connections().enterEditMode();
        connections().pickAnchor(b, 'layout');
        expect(connections().pickAnchor(a, 'layout')).toBe('failed');

        expect(connections().error).toBe('These terminals are already connected');
        expect(connections().pending).toBeNull();
        expect(project().connections).toHaveLength(1);
        expect(project().version).toBe(version);
        expect(warn).toHaveBeenCalledWith('[Connections] These terminals are already connected');

        connections().dismissError();
        expect(connections().error).toBeNull();
        warn.mockRestore();
    });

    it('drops the pick on exit and when its terminal goes away', () => {
        connections().enterEditMode();
        connections().pickAnchor(anchorOf(conductor), 'layout');
        connections().exitEditMode();
        expect(connections().pending).toBeNull();
        expect(connections().editMode).toBe(false);

        connections().enterEditMode();
        connections().pickAnchor(anchorOf(conductor), 'layout');
        project().removeBlock(conductor);
        connections().handleStructureChange();
        expect(connections().pending).toBeNull();
    });

    it('keeps the pick while its terminal still exists', () => {
        connections().enterEditMode();
        const tag = anchorOf(supply);
        connections().pickAnchor(tag, 'layout');
        project().removeBlock(conductor);
        connections().handleStructureChange();
        expect(connections().pending?.terminalId).toBe(tag.terminalId);
    });

    it('keeps connect and remove modes exclusive', () => {
        connections().enterEditMode();
        connections().pickAnchor(anchorOf(supply), 'layout');

        connections().toggleRemoveMode();
        expect(connections().removeMode).toBe(true);
        expect(connections().editMode).toBe(false);
        expect(connections().pending).toBeNull();

        connections().toggleEditMode();
        expect(connections().editMode).toBe(true);
        expect(connections().removeMode).toBe(false);
    });

    it('removes a clicked line only in remove mode', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const a = anchorOf(supply);
        const b = anchorOf(conductor);
        project().addConnection(a.terminalId, b.terminalId);
        const line = { leftId: a.terminalId, rightId: b.terminalId };

        expect(connections().removeLine(line)).toBe(false);
        expect(project().connections).toHaveLength(1);

        connections().enterRemoveMode();
        expect(connections().removeLine(line)).toBe(true);
        expect(project().connections).toEqual([]);
        expect(connections().removeMode).toBe(true);
        expect(info).toHaveBeenCalledWith(`[Connections] Removed connection ${a.terminalId}-${b.terminalId}`);
        info.mockRestore();
    });

    it('warns when the clicked line is already gone', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const a = anchorOf(supply);
        connections().enterRemoveMode();

        expect(connections().removeLine({ leftId: a.terminalId, rightId: 999 })).toBe(false);
        expect(warn).toHaveBeenCalledWith(`[Connections] Connection from terminal ${a.terminalId} not found`);
        warn.mockRestore();
    });
});
