import { useProjectStore } from '../engine/graph';
import { useViewStore } from '../store';
import type { ViewTab } from '../store';

function useTabLabel(tab: ViewTab): string {
    return useProjectStore((s) =>
        tab.subject.kind === 'layout' ? 'Layout' : (s.blocks[tab.subject.locationId]?.name ?? 'Location'),
    );
}

function Tab({ tab, active }: { tab: ViewTab; active: boolean }) {
    const label = useTabLabel(tab);
    const closable = tab.subject.kind === 'location';

    return (
        <div
            className={`canvas-tabs__tab ${active ? 'canvas-tabs__tab--active' : ''}`}
            onClick={() => useViewStore.getState().activate(tab.key)}
        >
            <span className="canvas-tabs__label">{label}</span>
            {closable && (
                <button
                    className="canvas-tabs__close"
                    title="Close tab"
                    onClick={(e) => {
                        e.stopPropagation();
                        useViewStore.getState().closeTab(tab.key);
                    }}
                >
                    ×
                </button>
            )}
        </div>
    );
}

export default function CanvasTabs() {
    const tabs = useViewStore((s) => s.tabs);
    const activeKey = useViewStore((s) => s.activeKey);

    return (
        <nav className="canvas-tabs">
            {tabs.map((tab) => (
                <Tab key={tab.key} tab={tab} active={tab.key === activeKey} />
            ))}
        </nav>
    );
}
