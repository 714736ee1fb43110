import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { connectStores } from './store';
import { initPersistence } from './persistence';

connectStores();

initPersistence().catch((err: unknown) => {
    console.error('[Persistence] Start-up failed, editing without saved state', err);
});

const root = document.getElementById('root');
if (!root) {
    throw new Error('Missing #root element');
}

createRoot(root).render(
    <StrictMode>
        <App />
    </StrictMode>,
);
