import { useMemo } from 'react';
import { useProjectStore, ROOT_PARENT_ID, KIND_LABELS } from '../engine/graph';
import type { Block } from '../engine/graph';
import { homeView } from '../canvas/core';
import { viewKeyFor } from '../canvas/types';
import { useInteractionStore, useViewStore } from '../store';
import { runGraphAction } from './graphAction';

/** Focus the block's home view and select it there */
function revealBlock(blockId: number): void {
    runGraphAction(() => {
        const subject = homeView(useProjectStore.getState().reader(), blockId);
        const views = useViewStore.getState();
        const viewKey = subject.kind === 'location' ? views.openLocationTab(subject.locationId) : viewKeyFor(subject);
        views.activate(viewKey);
        useInteractionStore.getState().selectBlock(blockId, viewKey);
    });
}

function openLocation(block: Block): void {
    if (block.kind !== 'location') return;
    runGraphAction(() => {
        useViewStore.getState().openLocationTab(block.id);
    });
}

type ChildIndex = Map<number, Block[]>;

/** Children per parent id, in creation order */
function indexChildren(blocks: Record<number, Block>): ChildIndex {
    const index: ChildIndex = new Map();
    for (const block of Object.values(blocks)) {
        const siblings = index.get(block.parentId);
        if (siblings) siblings.push(block);
        else index.set(block.parentId, [block]);
    }
    return index;
}

interface TreeNodeProps {
    block: Block;
    depth: number;
    index: ChildIndex;
    selectedId: number | null;
}

function TreeNode({ block, depth, index, selectedId }: TreeNodeProps) {
    const children = index.get(block.id) ?? [];

    return (
        <li className="project-tree__node">
            <div
                className={`project-tree__item ${block.id === selectedId ? 'project-tree__item--selected' : ''}`}
                style={{ paddingLeft: `${depth * 14 + 8}px` }}
                onClick={() => revealBlock(block.id)}
                onDoubleClick={() => openLocation(block)}
            >
                <span className="project-tree__name">{block.name}</span>
                <span className="project-tree__kind">{KIND_LABELS[block.kind]}</span>
            </div>
            {children.length > 0 && (
                <ul className="project-tree__children">
                    {children.map((child) => (
                        <TreeNode key={child.id} block={child} depth={depth + 1} index={index} selectedId={selectedId} />
                    ))}
                </ul>
            )}
        </li>
    );
}

export default function ProjectTree() {
    const name = useProjectStore((s) => s.name);
    const blocks = useProjectStore((s) => s.blocks);
    const index = useMemo(() => indexChildren(blocks), [blocks]);
    const roots = index.get(ROOT_PARENT_ID) ?? [];
    const selectedId = useInteractionStore((s) =>
        s.interaction.phase === 'idle' ? null : s.interaction.selection.blockId,
    );

    return (
        <div className="project-tree">
            <h3 className="project-tree__title">{name}</h3>
            {roots.length === 0 ? (
                <p className="project-tree__empty">Add a location or supply from the toolbar.</p>
            ) : (
                <ul className="project-tree__root">
                    {roots.map((block) => (
                        <TreeNode key={block.id} block={block} depth={0} index={index} selectedId={selectedId} />
                    ))}
                </ul>
            )}
        </div>
    );
}
