/**
 * LayoutPass — run a task once, after the next layout/paint pass.
 *
 * Single-shot and cancel-on-reissue: requesting again before the pass
 * fires replaces the pending task. Uses requestAnimationFrame in the
 * browser and a zero-delay timer elsewhere.
 */

type PendingHandle =
    | { kind: 'frame'; id: number }
    | { kind: 'timer'; id: ReturnType<typeof setTimeout> };

export class LayoutPass {
    private handle: PendingHandle | null = null;

    get isPending(): boolean {
        return this.handle !== null;
    }

    request(task: () => void): void {
        this.cancel();

        const run = () => {
            this.handle = null;
            task();
        };

        if (typeof requestAnimationFrame === 'function') {
            this.handle = { kind: 'frame', id: requestAnimationFrame(run) };
        } else {
            this.handle = { kind: 'timer', id: setTimeout(run, 0) };
        }
    }

    cancel(): void {
        if (!this.handle) return;
        if (this.handle.kind === 'frame') {
            cancelAnimationFrame(this.handle.id);
        } else {
            clearTimeout(this.handle.id);
        }
        this.handle = null;
    }
}
