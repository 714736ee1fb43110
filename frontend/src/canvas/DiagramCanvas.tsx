import { useEffect, useRef } from 'react';
import { Application } from 'pixi.js';
import { useProjectStore } from '../engine/graph/projectStore';
import { NotFoundError } from '../engine/graph/errors';
import { useConnectionStore, useInteractionStore, useViewStore } from '../store';
import { RenderLoop, buildRenderModel } from './core';
import type { LayerCallback, RenderModel } from './core';
import { GridLayer } from './layers/GridLayer';
import { BlockLayer } from './layers/BlockLayer';
import { ConnectionLayer } from './layers/ConnectionLayer';
import { AnchorLayer } from './layers/AnchorLayer';
import {
    handleDoubleClick,
    handleKeyDown,
    handlePointerDown,
    handlePointerMove,
    handlePointerUp,
    handleWheel,
} from './interaction/pointerRouting';
import { DEFAULT_THEME } from './types';
import type { Position, ViewKey } from './types';

interface DiagramCanvasProps {
    viewKey: ViewKey;
}

/** Stale ids (a block removed under the pointer) abort the gesture */
function guarded(action: () => void): void {
    try {
        action();
    } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        console.warn(`[Canvas] ${err.message}`);
    }
}

// ─── Interaction Handlers ───
function attachInteraction(canvas: HTMLCanvasElement, currentView: () => ViewKey): () => void {
    const toScreen = (e: MouseEvent): Position => {
        const rect = canvas.getBoundingClientRect();
        return { x: e.clientX - rect.left, y: e.clientY - rect.top };
    };

    const onPointerDown = (e: PointerEvent) => {
        if (e.button !== 0) return;
        canvas.setPointerCapture(e.pointerId);
        guarded(() => handlePointerDown(currentView(), toScreen(e)));
    };
    const onPointerMove = (e: PointerEvent) => {
        guarded(() => handlePointerMove(currentView(), toScreen(e)));
        canvas.style.cursor = useInteractionStore.getState().isDragActive() ? 'move' : 'default';
    };
    const onPointerUp = (e: PointerEvent) => {
        if (canvas.hasPointerCapture(e.pointerId)) canvas.releasePointerCapture(e.pointerId);
        guarded(() => handlePointerUp());
        canvas.style.cursor = 'default';
    };
    const onWheel = (e: WheelEvent) => {
        e.preventDefault();
        handleWheel(currentView(), toScreen(e), e.deltaY);
    };
    const onDoubleClick = (e: MouseEvent) => {
        guarded(() => {
            handleDoubleClick(currentView(), toScreen(e));
        });
    };
    const onKeyDown = (e: KeyboardEvent) => {
        const target = e.target;
        if (target instanceof HTMLInputElement || target instanceof HTMLTextAreaElement) return;
        if (handleKeyDown(currentView(), e)) e.preventDefault();
    };
    const onContextMenu = (e: MouseEvent) => e.preventDefault();

    canvas.addEventListener('pointerdown', onPointerDown);
    canvas.addEventListener('pointermove', onPointerMove);
    canvas.addEventListener('pointerup', onPointerUp);
    canvas.addEventListener('wheel', onWheel, { passive: false });
    canvas.addEventListener('dblclick', onDoubleClick);
    canvas.addEventListener('contextmenu', onContextMenu);
    window.addEventListener('keydown', onKeyDown);

    return () => {
        canvas.removeEventListener('pointerdown', onPointerDown);
        canvas.removeEventListener('pointermove', onPointerMove);
        canvas.removeEventListener('pointerup', onPointerUp);
        canvas.removeEventListener('wheel', onWheel);
        canvas.removeEventListener('dblclick', onDoubleClick);
        canvas.removeEventListener('contextmenu', onContextMenu);
        window.removeEventListener('keydown', onKeyDown);
    };
}

export default function DiagramCanvas({ viewKey }: DiagramCanvasProps) {
    const containerRef = useRef<HTMLDivElement>(null);
    const viewKeyRef = useRef(viewKey);
    const loopRef = useRef(new RenderLoop<RenderModel>());

    // ─── Active view ───
    useEffect(() => {
        viewKeyRef.current = viewKey;
        const container = containerRef.current;
        if (container && container.clientWidth > 0 && container.clientHeight > 0) {
            useViewStore.getState().setViewportSize(viewKey, {
                width: container.clientWidth,
                height: container.clientHeight,
            });
        }
        loopRef.current.markContentDirty();
    }, [viewKey]);

    // ─── Store changes → dirty flags ───
    useEffect(() => {
        const loop = loopRef.current;
        const unsubs = [
            useViewStore.subscribe((s, prev) => {
                if (s.contentRevision !== prev.contentRevision || s.tabs !== prev.tabs) {
                    loop.markContentDirty();
                } else if (s.overlayRevision !== prev.overlayRevision) {
                    loop.markOverlayDirty();
                }
            }),
            useProjectStore.subscribe(() => loop.markContentDirty()),
            useInteractionStore.subscribe(() => loop.markContentDirty()),
            useConnectionStore.subscribe(() => loop.markOverlayDirty()),
        ];
        return () => unsubs.forEach((unsub) => unsub());
    }, []);

    // ─── Viewport measurement ───
    useEffect(() => {
        const container = containerRef.current;
        if (!container) return;

        const observer = new ResizeObserver((entries) => {
            for (const entry of entries) {
                const { width, height } = entry.contentRect;
                useViewStore.getState().setViewportSize(viewKeyRef.current, { width, height });
            }
        });
        observer.observe(container);
        return () => observer.disconnect();
    }, []);

    // ─── Initialize PixiJS ───
    useEffect(() => {
        const container = containerRef.current;
        if (!container) return;

        const app = new Application();
        const loop = loopRef.current;
        let ready = false;
        let destroyed = false;
        let detach: () => void = () => {};
        const layers: LayerCallback<RenderModel>[] = [];

        const init = async () => {
            await app.init({
                background: DEFAULT_THEME.background,
                resizeTo: container,
                antialias: true,
                resolution: window.devicePixelRatio || 1,
                autoDensity: true,
            });

            if (destroyed) {
                app.destroy(true);
                return;
            }
            ready = true;
            container.appendChild(app.canvas);

            // Create render layers
            const grid = new GridLayer();
            const blocks = new BlockLayer();
            const lines = new ConnectionLayer();
            const anchors = new AnchorLayer();
            app.stage.addChild(grid.container, blocks.container, lines.container, anchors.container);

            layers.push(
                { tier: 'content', render: (m) => grid.render(m) },
                { tier: 'content', render: (m) => blocks.render(m) },
                { tier: 'overlay', render: (m) => lines.render(m) },
                { tier: 'overlay', render: (m) => anchors.render(m) },
            );
            layers.forEach((layer) => loop.addLayer(layer));

            detach = attachInteraction(app.canvas, () => viewKeyRef.current);
            app.ticker.add(() => {
                loop.frame(() => buildRenderModel(viewKeyRef.current));
            });
        };

        init().catch((err: unknown) => {
            console.error('[Canvas] Renderer failed to initialise', err);
        });

        return () => {
            destroyed = true;
            detach();
            layers.forEach((layer) => loop.removeLayer(layer));
            if (ready) app.destroy(true, { children: true });
        };
    }, []);

    return (
        <div
            ref={containerRef}
            className="diagram-canvas"
            style={{
                width: '100%',
                height: '100%',
                position: 'relative',
                overflow: 'hidden',
            }}
        />
    );
}
