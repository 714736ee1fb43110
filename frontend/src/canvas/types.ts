/* ─── Canvas Type Definitions ─── */

export interface Position {
    x: number;
    y: number;
}

export interface Size {
    width: number;
    height: number;
}

export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

/* ─── Views ─── */

export type ViewKind = 'layout' | 'location';

export type ViewSubject =
    | { kind: 'layout' }
    | { kind: 'location'; locationId: number };

export type ViewKey = 'layout' | `location:${number}`;

export const LAYOUT_VIEW_KEY: ViewKey = 'layout';

export function viewKeyFor(subject: ViewSubject): ViewKey {
    return subject.kind === 'layout' ? LAYOUT_VIEW_KEY : `location:${subject.locationId}`;
}

/* ─── Anchors ─── */

export type AnchorSide = 'top' | 'right' | 'bottom' | 'left';

/** Opaque payload carried by an anchor dot and handed back on pick */
export interface AnchorTag {
    blockId: number;
    terminalId: number;
}

/* ─── Theme ─── */

export interface CanvasTheme {
    background: number;
    canvasFill: number;
    canvasBorder: number;
    gridMajor: number;
    gridMinor: number;
    gridMajorAlpha: number;
    gridMinorAlpha: number;
    blockFill: number;
    blockBorder: number;
    blockBorderSelected: number;
    blockBorderDragging: number;
    busbarBand: number;
    rowFill: number;
    anchorDefault: number;
    anchorPending: number;
    connection: number;
    connectionRemovable: number;
    text: number;
    textMuted: number;
}

export const DEFAULT_THEME: CanvasTheme = {
    background: 0x0d0d1a,
    canvasFill: 0x12122a,
    canvasBorder: 0x2a2a4a,
    gridMajor: 0x2a2a4a,
    gridMinor: 0x1a1a2e,
    gridMajorAlpha: 0.6,
    gridMinorAlpha: 0.3,
    blockFill: 0x1e2a3a,
    blockBorder: 0x78909c,
    blockBorderSelected: 0x4fc3f7,
    blockBorderDragging: 0xffb74d,
    busbarBand: 0x37474f,
    rowFill: 0x263238,
    anchorDefault: 0xff00ff,
    anchorPending: 0xffa500,
    connection: 0x64b5f6,
    connectionRemovable: 0xef5350,
    text: 0xe8e8f0,
    textMuted: 0x9999bb,
};

/* ─── Constants ─── */

/** Logical canvas extent of every view */
export const CANVAS_SIZE: Size = { width: 2000, height: 1500 };

export const GRID_SIZE = 20;
export const GRID_MAJOR_EVERY = 5;
export const MIN_ZOOM = 0.1;
export const MAX_ZOOM = 5;
export const ZOOM_STEP = 0.1;
/** Fraction of the content size added on each side by fit-to-content */
export const FIT_PADDING_RATIO = 0.1;
export const DOT_SIZE = 12;
export const DOT_OFFSET = DOT_SIZE / 2;
/** Anchor pick radius in screen pixels */
export const ANCHOR_HIT_RADIUS = 10;
/** Connection line pick distance in screen pixels */
export const LINE_HIT_TOLERANCE = 6;
