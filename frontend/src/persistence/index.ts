// ─── Public API ───

export { initPersistence, manualSave } from './bootstrap';

export { useHistoryStore } from './historyStore';
export type { HistoryEntry } from './historyStore';
