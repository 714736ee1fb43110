import { useHistoryStore } from '../persistence';
import { restoreHistoryEntry } from './projectActions';

function formatTime(timestamp: number): string {
    return new Date(timestamp).toLocaleString();
}

function formatSize(bytes: number): string {
    return bytes < 1024 ? `${bytes} B` : `${(bytes / 1024).toFixed(1)} KB`;
}

export default function HistoryPanel() {
    const entries = useHistoryStore((s) => s.entries);
    const lastSaveTime = useHistoryStore((s) => s.lastSaveTime);

    const restore = (id: string) => {
        restoreHistoryEntry(id, () => window.confirm('Discard unsaved changes and restore this version?')).catch(
            (err: unknown) => {
                console.warn('[Persistence] Restore failed:', err);
            },
        );
    };

    const remove = (id: string) => {
        useHistoryStore
            .getState()
            .remove(id)
            .catch((err: unknown) => {
                console.warn('[Persistence] Delete failed:', err);
            });
    };

    return (
        <div className="history">
            <h3 className="history__title">History</h3>
            <p className="history__meta">
                {lastSaveTime === null ? 'Not saved yet' : `Last saved ${formatTime(lastSaveTime)}`}
            </p>
            <ul>
                {entries.map((entry) => (
                    <li key={entry.id} className="history__item">
                        <div className="history__label">
                            <span>{entry.label}</span>
                            <span className="history__detail">
                                {formatTime(entry.timestamp)} · {entry.blockCount} blocks · {formatSize(entry.sizeBytes)}
                            </span>
                        </div>
                        <button className="history__action" onClick={() => restore(entry.id)}>
                            Restore
                        </button>
                        <button className="history__action" onClick={() => remove(entry.id)}>
                            Delete
                        </button>
                    </li>
                ))}
            </ul>
        </div>
    );
}
