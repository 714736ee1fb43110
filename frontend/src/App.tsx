import DiagramCanvas from './canvas/DiagramCanvas';
import { useViewStore } from './store';
import { useProjectStore } from './engine/graph';
import { ErrorBoundary } from './components/ErrorBoundary';
import Toolbar from './components/Toolbar';
import CanvasTabs from './components/CanvasTabs';
import ConnectionErrorBanner from './components/ConnectionErrorBanner';
import ProjectTree from './components/ProjectTree';
import PropertiesPanel from './components/PropertiesPanel';
import HistoryPanel from './components/HistoryPanel';
import './styles/index.css';

export default function App() {
    const activeKey = useViewStore((s) => s.activeKey);
    const blockCount = useProjectStore((s) => Object.keys(s.blocks).length);

    return (
        <div className="app">
            <header className="app__header">
                <div className="app__logo">
                    <span className="app__logo-icon">⚡</span>
                    <h1 className="app__title">Power Layout</h1>
                    <span className="app__subtitle">Single-line diagram editor</span>
                </div>
                <span className="app__status">{blockCount === 0 ? 'Empty project' : `${blockCount} blocks`}</span>
            </header>

            <Toolbar />

            <main className="app__main">
                <aside className="app__sidebar">
                    <ProjectTree />
                    <PropertiesPanel />
                    <HistoryPanel />
                </aside>

                <section className="app__canvas">
                    <CanvasTabs />
                    <ConnectionErrorBanner />
                    <div className="app__canvas-body">
                        <ErrorBoundary
                            resetKey={activeKey}
                            fallback={(error, retry) => (
                                <div className="app__canvas-fallback">
                                    <p className="app__canvas-fallback-title">⚠ Canvas failed to load</p>
                                    <p className="app__canvas-fallback-detail">
                                        {error.message || 'WebGL may not be available.'}
                                    </p>
                                    <button className="error-boundary__retry" onClick={retry}>
                                        Retry
                                    </button>
                                </div>
                            )}
                        >
                            <DiagramCanvas viewKey={activeKey} />
                        </ErrorBoundary>
                    </div>
                </section>
            </main>
        </div>
    );
}
