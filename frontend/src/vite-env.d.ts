/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_ZOOM_MIN?: string;
    readonly VITE_ZOOM_MAX?: string;
    readonly VITE_ZOOM_STEP?: string;
    readonly VITE_DRAG_SNAP?: string;
    readonly VITE_AUTOSAVE_MS?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
