/**
 * RenderLoop — dirty-tracked frame pipeline driven by the pixi ticker.
 *
 * Layers sit in one of two tiers. Content (grid, blocks) always renders
 * before overlays (connection lines, anchor dots), and marking content
 * dirty marks the overlays too, since they are placed from content geometry.
 */

export type LayerTier = 'content' | 'overlay';

export interface LayerCallback<T> {
    tier: LayerTier;
    render: (frame: T) => void;
}

export class RenderLoop<T> {
    private layers: LayerCallback<T>[] = [];
    private contentDirty = true;
    private overlayDirty = true;

    // ─── Layer Registration ───

    addLayer(layer: LayerCallback<T>): void {
        this.layers.push(layer);
        this.contentDirty = true;
    }

    removeLayer(layer: LayerCallback<T>): void {
        this.layers = this.layers.filter((l) => l !== layer);
    }

    // ─── Dirty Flagging ───

    markContentDirty(): void {
        this.contentDirty = true;
        this.overlayDirty = true;
    }

    markOverlayDirty(): void {
        this.overlayDirty = true;
    }

    get isDirty(): boolean {
        return this.contentDirty || this.overlayDirty;
    }

    // ─── Frame ───

    /**
     * Render dirty tiers with a frame value built on demand.
     * Returns true when anything was drawn.
     */
    frame(build: () => T): boolean {
        if (!this.isDirty) return false;

        const value = build();
        const content = this.contentDirty;
        this.contentDirty = false;
        this.overlayDirty = false;

        if (content) {
            for (const layer of this.layers) {
                if (layer.tier === 'content') layer.render(value);
            }
        }
        for (const layer of this.layers) {
            if (layer.tier === 'overlay') layer.render(value);
        }
        return true;
    }
}
