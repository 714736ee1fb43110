import { useConnectionStore } from '../store';

export default function ConnectionErrorBanner() {
    const error = useConnectionStore((s) => s.error);
    const editMode = useConnectionStore((s) => s.editMode);
    const removeMode = useConnectionStore((s) => s.removeMode);
    const pending = useConnectionStore((s) => s.pending);

    if (error) {
        return (
            <div className="banner banner--error" role="alert">
                <span>{error}</span>
                <button className="banner__dismiss" onClick={() => useConnectionStore.getState().dismissError()}>
                    Dismiss
                </button>
            </div>
        );
    }

    if (removeMode) {
        return <div className="banner banner--info">Click a line to remove it, or Escape to finish</div>;
    }

    if (!editMode) return null;

    return (
        <div className="banner banner--info">
            {pending ? 'Pick the second terminal, or Escape to cancel' : 'Pick a terminal to start a connection'}
        </div>
    );
}
