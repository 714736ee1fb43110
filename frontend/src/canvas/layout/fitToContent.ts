/**
 * Fit-to-Content — choose zoom and pan so a view's blocks fill its viewport.
 *
 * Works in canvas space: each block contributes center ± footprint/2, the
 * union is padded by FIT_PADDING_RATIO of its size on every side, and the
 * padded box is centered in the viewport at the largest zoom that fits.
 */

import { ViewNotReadyError } from '../../engine/graph/errors';
import type { GraphReader } from '../../engine/graph/queries';
import type { Rect, Size, ViewKey, ViewSubject } from '../types';
import { FIT_PADDING_RATIO } from '../types';
import { rectCenter, unionRects } from '../core/coordinates';
import { buildScene } from '../core/scene';
import type { Scene } from '../core/scene';
import { Viewport } from '../core/Viewport';
import type { ViewportState, ZoomLimits } from '../core/Viewport';

function contentBounds(scene: Scene): Rect | null {
    return unionRects(scene.items.map((item) => item.rect));
}

export function padRect(rect: Rect, ratio: number = FIT_PADDING_RATIO): Rect {
    const padX = rect.width * ratio;
    const padY = rect.height * ratio;
    return {
        x: rect.x - padX,
        y: rect.y - padY,
        width: rect.width + padX * 2,
        height: rect.height + padY * 2,
    };
}

export function computeFitTransform(
    content: Rect | null,
    viewportSize: Size,
    canvasSize: Size,
    limits: ZoomLimits,
): ViewportState {
    const vw = viewportSize.width;
    const vh = viewportSize.height;

    // Nothing to show: canvas center at the viewport center, 100%
    if (!content) {
        return {
            x: vw / 2 - canvasSize.width / 2,
            y: vh / 2 - canvasSize.height / 2,
            zoom: 1,
        };
    }

    const padded = padRect(content);
    const raw = Math.min(vw / padded.width, vh / padded.height);
    const zoom = Math.max(limits.min, Math.min(limits.max, raw));
    const center = rectCenter(padded);

    return {
        x: vw / 2 - center.x * zoom,
        y: vh / 2 - center.y * zoom,
        zoom,
    };
}

/**
 * Fit one view. Throws ViewNotReadyError while the viewport is unmeasured.
 */
export function fitView(
    viewKey: ViewKey,
    graph: GraphReader,
    subject: ViewSubject,
    viewport: Viewport,
    viewportSize: Size | null,
): ViewportState {
    if (!viewportSize || viewportSize.width <= 0 || viewportSize.height <= 0) {
        throw new ViewNotReadyError(viewKey);
    }

    const scene = buildScene(graph, subject, viewport);
    return computeFitTransform(contentBounds(scene), viewportSize, viewport.canvasSize, viewport.limits);
}
