import { useState } from 'react';
import {
    useProjectStore,
    isEquipmentBlock,
    getRenderPosition,
    formatProjectVersion,
    KIND_LABELS,
    PROJECT_INFO_FIELDS,
    PROJECT_INFO_LABELS,
} from '../engine/graph';
import type { Block, RowProtection } from '../engine/graph';
import { useInteractionStore } from '../store';
import { runGraphAction } from './graphAction';
import { moveBlockAxis, toNumber, updateProjectInfo } from './projectActions';

const project = () => useProjectStore.getState();

/** Text field that commits on Enter or blur and reverts when the edit is rejected */
function CommitField({
    label,
    value,
    onCommit,
}: {
    label: string;
    value: string;
    onCommit: (value: string) => void;
}) {
    const [draft, setDraft] = useState(value);
    const [lastValue, setLastValue] = useState(value);

    if (value !== lastValue) {
        setLastValue(value);
        setDraft(value);
    }

    const commit = () => {
        if (draft === value) return;
        if (!runGraphAction(() => onCommit(draft))) setDraft(value);
    };

    return (
        <label className="properties__field">
            <span className="properties__label">{label}</span>
            <input
                className="properties__input"
                value={draft}
                onChange={(e) => setDraft(e.target.value)}
                onBlur={commit}
                onKeyDown={(e) => {
                    if (e.key === 'Enter') commit();
                }}
            />
        </label>
    );
}

function KindFields({ block }: { block: Block }) {
    switch (block.kind) {
        case 'supply':
            return (
                <>
                    <CommitField
                        label="Voltage (V)"
                        value={String(block.voltageV)}
                        onCommit={(v) => project().setSupplyRatings(block.id, toNumber(v), block.impedanceOhm)}
                    />
                    <CommitField
                        label="Impedance (Ω)"
                        value={String(block.impedanceOhm)}
                        onCommit={(v) => project().setSupplyRatings(block.id, block.voltageV, toNumber(v))}
                    />
                </>
            );
        case 'conductor':
            return (
                <CommitField
                    label="Length (m)"
                    value={String(block.lengthM)}
                    onCommit={(v) => project().setConductorLength(block.id, toNumber(v))}
                />
            );
        case 'row':
            return (
                <>
                    <label className="properties__field">
                        <span className="properties__label">Protection</span>
                        <select
                            className="properties__input"
                            value={block.protection}
                            onChange={(e) => {
                                const protection: RowProtection = e.target.value === 'pin' ? 'pin' : 'circuitBreaker';
                                runGraphAction(() =>
                                    project().setRowProtection(block.id, protection, protection === 'pin' ? null : 0),
                                );
                            }}
                        >
                            <option value="circuitBreaker">Circuit breaker</option>
                            <option value="pin">Pin</option>
                        </select>
                    </label>
                    {block.protection === 'circuitBreaker' && (
                        <CommitField
                            label="Rating (A)"
                            value={String(block.ratingA ?? 0)}
                            onCommit={(v) => project().setRowProtection(block.id, 'circuitBreaker', toNumber(v))}
                        />
                    )}
                </>
            );
        default:
            return null;
    }
}

function PositionFields({ block }: { block: Block }) {
    if (block.kind === 'row') return null;
    const position = getRenderPosition(block);

    return (
        <>
            <CommitField
                label="X"
                value={position ? String(position.x) : ''}
                onCommit={(v) => moveBlockAxis(block.id, 'x', v)}
            />
            <CommitField
                label="Y"
                value={position ? String(position.y) : ''}
                onCommit={(v) => moveBlockAxis(block.id, 'y', v)}
            />
        </>
    );
}

function ProjectProperties() {
    const name = useProjectStore((s) => s.name);
    const info = useProjectStore((s) => s.info);

    return (
        <div className="properties">
            <h3 className="properties__title">Project {formatProjectVersion(info)}</h3>
            <CommitField label="Name" value={name} onCommit={(v) => project().setProjectName(v)} />
            {PROJECT_INFO_FIELDS.map((field) => (
                <CommitField
                    key={field}
                    label={PROJECT_INFO_LABELS[field]}
                    value={String(info[field])}
                    onCommit={(v) => updateProjectInfo(field, v)}
                />
            ))}
            <p className="properties__empty">Select a block to edit its properties.</p>
        </div>
    );
}

export default function PropertiesPanel() {
    const selectedId = useInteractionStore((s) =>
        s.interaction.phase === 'idle' ? null : s.interaction.selection.blockId,
    );
    const block = useProjectStore((s) => (selectedId === null ? null : (s.blocks[selectedId] ?? null)));

    if (!block) return <ProjectProperties />;

    return (
        <div className="properties" key={block.id}>
            <h3 className="properties__title">{KIND_LABELS[block.kind]}</h3>
            <CommitField
                label="Name"
                value={block.name}
                onCommit={(v) => project().renameBlock(block.id, v)}
            />
            <PositionFields block={block} />
            <KindFields block={block} />
            {isEquipmentBlock(block) && (
                <CommitField
                    label="Equipment"
                    value={block.equipmentId ?? ''}
                    onCommit={(v) => project().assignEquipment(block.id, v.trim() === '' ? null : v.trim())}
                />
            )}
        </div>
    );
}
