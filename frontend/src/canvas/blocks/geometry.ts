/* ─── Block Geometry (logical units) ─── */

export const LOCATION_SIZE = 200;

/** Supply circle diameter; alternator diamond side */
export const SOURCE_SIZE = 150;

export const CONDUCTOR_WIDTH = 300;
export const CONDUCTOR_HEIGHT = 100;

export const BUSBAR_WIDTH = 350;
export const BUSBAR_NAME_HEIGHT = 35;
export const BUSBAR_ROW_HEIGHT = 50;
/** Band under the last row holding the add-row affordance */
const BUSBAR_PLUS_HEIGHT = 40;
const BUSBAR_GAP = 5;

export const TRANSFORMER_CIRCLE = 100;
const TRANSFORMER_OVERLAP = 30;
export const TRANSFORMER_WIDTH = TRANSFORMER_CIRCLE * 2 - TRANSFORMER_OVERLAP;

export const LOAD_SIZE = 120;

export const EXTERNAL_BUSBAR_WIDTH = 140;
export const EXTERNAL_BUSBAR_ROWS = 8;
export const EXTERNAL_BUSBAR_ROW_HEIGHT = 50;
export const EXTERNAL_BUSBAR_HEIGHT = EXTERNAL_BUSBAR_ROWS * EXTERNAL_BUSBAR_ROW_HEIGHT;

export function busbarHeight(rowCount: number): number {
    return BUSBAR_NAME_HEIGHT + rowCount * BUSBAR_ROW_HEIGHT + BUSBAR_PLUS_HEIGHT + BUSBAR_GAP;
}

/** Canvas-space y of a row's center, from the busbar's top edge */
export function rowCenterY(busbarTop: number, index: number): number {
    return busbarTop + BUSBAR_NAME_HEIGHT + index * BUSBAR_ROW_HEIGHT + BUSBAR_ROW_HEIGHT / 2;
}
