/**
 * Editor Config — tunables for zoom, dragging and auto-save.
 *
 * Defaults below; a deployment can override them through VITE_* env
 * variables, and callers (tests, embedders) through configureEditor().
 */

import { MAX_ZOOM, MIN_ZOOM, ZOOM_STEP, GRID_SIZE, ANCHOR_HIT_RADIUS } from '../canvas/types';

// ─── Config ───

export interface EditorConfig {
    zoomMin: number;
    zoomMax: number;
    /** Additive zoom step for toolbar buttons and the wheel */
    zoomStep: number;
    /** Snap a dragged block's center to the grid */
    dragSnap: boolean;
    gridSize: number;
    /** Anchor pick radius in screen pixels */
    anchorHitRadius: number;
    /** Auto-save interval in milliseconds */
    autoSaveIntervalMs: number;
}

export const DEFAULT_EDITOR_CONFIG: EditorConfig = {
    zoomMin: MIN_ZOOM,
    zoomMax: MAX_ZOOM,
    zoomStep: ZOOM_STEP,
    dragSnap: false,
    gridSize: GRID_SIZE,
    anchorHitRadius: ANCHOR_HIT_RADIUS,
    autoSaveIntervalMs: 10_000,
};

// ─── Env ───

export type EnvSource = Record<string, string | boolean | undefined>;

function envNumber(env: EnvSource, key: string): number | undefined {
    const raw = env[key];
    if (typeof raw !== 'string' || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        console.warn(`[Config] Ignoring ${key}=${raw}: not a number`);
        return undefined;
    }
    return value;
}

function envFlag(env: EnvSource, key: string): boolean | undefined {
    const raw = env[key];
    if (typeof raw === 'boolean') return raw;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    return undefined;
}

export function configFromEnv(env: EnvSource): Partial<EditorConfig> {
    const result: Partial<EditorConfig> = {};

    const zoomMin = envNumber(env, 'VITE_ZOOM_MIN');
    if (zoomMin !== undefined) result.zoomMin = zoomMin;
    const zoomMax = envNumber(env, 'VITE_ZOOM_MAX');
    if (zoomMax !== undefined) result.zoomMax = zoomMax;
    const zoomStep = envNumber(env, 'VITE_ZOOM_STEP');
    if (zoomStep !== undefined) result.zoomStep = zoomStep;
    const dragSnap = envFlag(env, 'VITE_DRAG_SNAP');
    if (dragSnap !== undefined) result.dragSnap = dragSnap;
    const autoSave = envNumber(env, 'VITE_AUTOSAVE_MS');
    if (autoSave !== undefined) result.autoSaveIntervalMs = autoSave;

    return result;
}

/**
 * Merge defaults, env and explicit overrides (later wins) and sanity-check
 * the zoom range.
 */
export function resolveEditorConfig(
    overrides: Partial<EditorConfig> = {},
    env: EnvSource = import.meta.env,
): EditorConfig {
    const config = { ...DEFAULT_EDITOR_CONFIG, ...configFromEnv(env), ...overrides };
    if (config.zoomMin <= 0 || config.zoomMin > config.zoomMax) {
        console.warn('[Config] Invalid zoom range, falling back to defaults');
        config.zoomMin = DEFAULT_EDITOR_CONFIG.zoomMin;
        config.zoomMax = DEFAULT_EDITOR_CONFIG.zoomMax;
    }
    return config;
}

// ─── Active config ───

let active: EditorConfig | null = null;

export function getEditorConfig(): EditorConfig {
    if (!active) active = resolveEditorConfig();
    return active;
}

export function configureEditor(overrides: Partial<EditorConfig>): EditorConfig {
    active = resolveEditorConfig(overrides);
    return active;
}
