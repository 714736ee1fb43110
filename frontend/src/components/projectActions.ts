import { useProjectStore, getRenderPosition, isTextField } from '../engine/graph';
import type { ProjectInfo, ProjectInfoField } from '../engine/graph';
import { useConnectionStore } from '../store';
import { useHistoryStore } from '../persistence';

export type SavePromptChoice = 'save' | 'discard' | 'cancel';

/** Empty input reads as NaN so the store rejects it */
export function toNumber(raw: string): number {
    return raw.trim() === '' ? Number.NaN : Number(raw);
}

// ─── Project ───

/**
 * Replace the project with an empty one. A modified project is saved or
 * discarded first, as `ask` decides; a failed save keeps it open.
 */
export async function startNewProject(
    ask: () => SavePromptChoice,
    save: () => Promise<boolean>,
): Promise<boolean> {
    if (useProjectStore.getState().isModified) {
        const choice = ask();
        if (choice === 'cancel') return false;
        if (choice === 'save' && !(await save())) {
            console.warn('[Graph] Keeping the current project: save failed');
            return false;
        }
    }

    useConnectionStore.getState().reset();
    useProjectStore.getState().newProject();
    return true;
}

export function updateProjectInfo(field: ProjectInfoField, raw: string): void {
    const patch: Partial<ProjectInfo> = {};
    if (isTextField(field)) patch[field] = raw;
    else patch[field] = toNumber(raw);
    useProjectStore.getState().setProjectInfo(patch);
}

// ─── Blocks ───

/** Set one coordinate of a block; an unplaced block keeps 0 on the other axis */
export function moveBlockAxis(blockId: number, axis: 'x' | 'y', raw: string): void {
    const project = useProjectStore.getState();
    const current = getRenderPosition(project.getBlock(blockId)) ?? { x: 0, y: 0 };
    project.setRenderPosition(blockId, { ...current, [axis]: toNumber(raw) });
}

// ─── History ───

/** Unsaved edits are lost on restore, so they are confirmed first */
export async function restoreHistoryEntry(id: string, confirmDiscard: () => boolean): Promise<boolean> {
    if (useProjectStore.getState().isModified && !confirmDiscard()) return false;
    return useHistoryStore.getState().restore(id);
}
