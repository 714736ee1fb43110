import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { useProjectStore } from '../engine/graph/projectStore';
import { InvalidBlockError, InvalidProjectError } from '../engine/graph/errors';
import { useConnectionStore } from '../store/connectionStore';
import { PersistenceManager } from '../persistence/PersistenceManager';
import { MemorySnapshotStorage } from '../persistence/storage';
import { useHistoryStore } from '../persistence/historyStore';
import { moveBlockAxis, restoreHistoryEntry, startNewProject, updateProjectInfo } from './projectActions';
import type { SavePromptChoice } from './projectActions';

const project = () => useProjectStore.getState();

describe('startNewProject', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        project().reset();
        useConnectionStore.getState().reset();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('does not ask about an unmodified project', async () => {
        const ask = vi.fn((): SavePromptChoice => 'cancel');
        const save = vi.fn(async () => true);

        expect(await startNewProject(ask, save)).toBe(true);
        expect(ask).not.toHaveBeenCalled();
        expect(save).not.toHaveBeenCalled();
    });

    it('saves a modified project before replacing it', async () => {
        project().addBlock('supply');
        const save = vi.fn(async () => true);

        expect(await startNewProject(() => 'save', save)).toBe(true);
        expect(save).toHaveBeenCalledTimes(1);
        expect(project().getAllBlocks()).toEqual([]);
        expect(project().isModified).toBe(false);
    });

    it('discards a modified project without saving', async () => {
        project().addBlock('supply');
        const save = vi.fn(async () => true);

        expect(await startNewProject(() => 'discard', save)).toBe(true);
        expect(save).not.toHaveBeenCalled();
        expect(project().getAllBlocks()).toEqual([]);
    });

    it('keeps the project when the prompt is cancelled', async () => {
        const id = project().addBlock('supply');
        const save = vi.fn(async () => true);

        expect(await startNewProject(() => 'cancel', save)).toBe(false);
        expect(save).not.toHaveBeenCalled();
        expect(project().getAllBlocks().map((b) => b.id)).toEqual([id]);
    });

    it('keeps the project when the save fails', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        project().addBlock('supply');

        expect(await startNewProject(() => 'save', async () => false)).toBe(false);
        expect(project().getAllBlocks()).toHaveLength(1);
        expect(warn).toHaveBeenCalledWith('[Graph] Keeping the current project: save failed');
    });

    it('leaves connect and remove modes', async () => {
        useConnectionStore.getState().enterRemoveMode();
        await startNewProject(() => 'discard', async () => true);
        expect(useConnectionStore.getState().removeMode).toBe(false);
    });
});

describe('property edits', () => {
    beforeEach(() => {
        project().reset();
    });

    it('updates text and number fields of the project info', () => {
        updateProjectInfo('designer', '  Test Designer ');
        updateProjectInfo('minorVersion', '3');

        expect(project().info).toMatchObject({ designer: 'Test Designer', minorVersion: 3 });
    });

    it('rejects an empty number field', () => {
        expect(() => updateProjectInfo('checkDate', ' ')).toThrow(InvalidProjectError);
        expect(project().info.checkDate).toBe(0);
    });

    it('moves a block one axis at a time', () => {
        const supply = project().addBlock('supply');

        moveBlockAxis(supply, 'x', '40');
        expect(project().getBlock(supply)).toMatchObject({ renderPosition: { x: 40, y: 0 } });

        moveBlockAxis(supply, 'y', '-20');
        expect(project().getBlock(supply)).toMatchObject({ renderPosition: { x: 40, y: -20 } });
    });

    it('refuses to move a busbar row', () => {
        const location = project().addBlock('location');
        const busbar = project().addBlock('busbar', location);
        const row = project().addBlock('row', busbar);

        expect(() => moveBlockAxis(row, 'x', '10')).toThrow(InvalidBlockError);
    });
});

describe('restoreHistoryEntry', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        project().reset();
        useHistoryStore.getState().reset();
    });

    afterEach(() => {
        useHistoryStore.getState().reset();
        vi.restoreAllMocks();
    });

    it('asks before dropping unsaved edits', async () => {
        const manager = new PersistenceManager(new MemorySnapshotStorage(), { maxSnapshots: 10 });
        manager.bind({
            getSnapshot: () => project().getSnapshot(),
            loadSnapshot: (snapshot) => project().loadSnapshot(snapshot),
        });
        useHistoryStore.getState().attach(manager);

        const supply = project().addBlock('supply');
        await manager.save();
        project().addBlock('conductor');
        await useHistoryStore.getState().refresh();
        const [entry] = useHistoryStore.getState().entries;

        expect(await restoreHistoryEntry(entry.id, () => false)).toBe(false);
        expect(project().getAllBlocks()).toHaveLength(2);

        expect(await restoreHistoryEntry(entry.id, () => true)).toBe(true);
        expect(project().getAllBlocks().map((b) => b.id)).toEqual([supply]);
    });
});
