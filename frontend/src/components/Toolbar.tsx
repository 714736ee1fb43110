import { useProjectStore, KIND_LABELS, ROOT_PARENT_ID } from '../engine/graph';
import type { BlockKind } from '../engine/graph';
import { useConnectionStore, useInteractionStore, useViewStore } from '../store';
import { manualSave } from '../persistence';
import { runGraphAction } from './graphAction';
import { startNewProject } from './projectActions';
import type { SavePromptChoice } from './projectActions';

const LAYOUT_KINDS: BlockKind[] = ['location', 'supply', 'alternator', 'conductor'];
const LOCATION_KINDS: BlockKind[] = ['busbar', 'transformerUps', 'load'];

function askToSave(): SavePromptChoice {
    if (window.confirm('Save changes to the current project first?')) return 'save';
    return window.confirm('Discard unsaved changes?') ? 'discard' : 'cancel';
}

export default function Toolbar() {
    const activeKey = useViewStore((s) => s.activeKey);
    const subject = useViewStore((s) => s.findTab(s.activeKey)?.subject ?? null);
    const selectedId = useInteractionStore((s) =>
        s.interaction.phase === 'idle' ? null : s.interaction.selection.blockId,
    );
    const selectedKind = useProjectStore((s) =>
        selectedId === null ? null : (s.blocks[selectedId]?.kind ?? null),
    );
    const isModified = useProjectStore((s) => s.isModified);
    const editMode = useConnectionStore((s) => s.editMode);
    const removeMode = useConnectionStore((s) => s.removeMode);
    const lineMode = editMode || removeMode;

    const parentId = subject?.kind === 'location' ? subject.locationId : ROOT_PARENT_ID;
    const kinds = subject?.kind === 'location' ? LOCATION_KINDS : LAYOUT_KINDS;

    const add = (kind: BlockKind, parent: number) => {
        runGraphAction(() => {
            const id = useProjectStore.getState().addBlock(kind, parent);
            if (kind !== 'row') useInteractionStore.getState().selectBlock(id, activeKey);
        });
    };

    const handleNew = () => {
        startNewProject(askToSave, () => manualSave()).catch((err: unknown) => {
            console.warn('[Persistence] New project failed:', err);
        });
    };

    const handleSave = () => {
        manualSave().catch((err: unknown) => {
            console.warn('[Persistence] Manual save failed:', err);
        });
    };

    return (
        <div className="toolbar">
            <div className="toolbar__group">
                {kinds.map((kind) => (
                    <button
                        key={kind}
                        className="toolbar__button"
                        onClick={() => add(kind, parentId)}
                        disabled={lineMode}
                    >
                        + {KIND_LABELS[kind]}
                    </button>
                ))}
                {selectedKind === 'busbar' && selectedId !== null && (
                    <button
                        className="toolbar__button"
                        onClick={() => add('row', selectedId)}
                        disabled={lineMode}
                    >
                        + Row
                    </button>
                )}
                <button
                    className="toolbar__button"
                    onClick={() => runGraphAction(() => useInteractionStore.getState().deleteSelection())}
                    disabled={selectedId === null || selectedKind === 'externalBusbar'}
                >
                    Delete
                </button>
            </div>

            <div className="toolbar__group">
                <button className="toolbar__button" onClick={() => useViewStore.getState().zoomOut(activeKey)}>
                    −
                </button>
                <button className="toolbar__button" onClick={() => useViewStore.getState().zoomIn(activeKey)}>
                    +
                </button>
                <button className="toolbar__button" onClick={() => useViewStore.getState().fitToContent(activeKey)}>
                    Fit
                </button>
            </div>

            <div className="toolbar__group">
                <button
                    className={`toolbar__button ${editMode ? 'toolbar__button--active' : ''}`}
                    onClick={() => useConnectionStore.getState().toggleEditMode()}
                >
                    {editMode ? 'Done Connecting' : 'Connect'}
                </button>
                <button
                    className={`toolbar__button ${removeMode ? 'toolbar__button--active' : ''}`}
                    onClick={() => useConnectionStore.getState().toggleRemoveMode()}
                >
                    {removeMode ? 'Done Removing' : 'Remove Connections'}
                </button>
            </div>

            <div className="toolbar__group">
                <button className="toolbar__button" onClick={handleNew}>
                    New
                </button>
                <button className="toolbar__button" onClick={handleSave}>
                    Save
                </button>
                <span className="toolbar__status">{isModified ? 'Unsaved changes' : 'Saved'}</span>
            </div>
        </div>
    );
}
