import { describe, it, expect } from 'vitest';
import { computeOrthogonalRoute, routeConnection, snapToGrid } from './routing';

describe('routing', () => {
    it('splits an offset route at the horizontal midpoint', () => {
        expect(computeOrthogonalRoute({ x: 0, y: 0 }, { x: 100, y: 40 })).toEqual([
            { x: 0, y: 0 },
            { x: 50, y: 0 },
            { x: 50, y: 40 },
            { x: 100, y: 40 },
        ]);
    });

    it('keeps aligned ends straight', () => {
        expect(computeOrthogonalRoute({ x: 0, y: 10 }, { x: 200, y: 10 })).toEqual([
            { x: 0, y: 10 },
            { x: 200, y: 10 },
        ]);
    });

    it('leaves each anchor perpendicular to its edge', () => {
        const route = routeConnection(
            { point: { x: 1000, y: 825 }, side: 'bottom' },
            { point: { x: 1150, y: 900 }, side: 'left' },
        );
        expect(route).toEqual([
            { x: 1000, y: 825 },
            { x: 1000, y: 845 },
            { x: 1065, y: 845 },
            { x: 1065, y: 900 },
            { x: 1130, y: 900 },
            { x: 1150, y: 900 },
        ]);
    });

    it('drops repeated points between facing anchors', () => {
        const route = routeConnection(
            { point: { x: 0, y: 0 }, side: 'right' },
            { point: { x: 40, y: 0 }, side: 'left' },
        );
        expect(route).toEqual([
            { x: 0, y: 0 },
            { x: 20, y: 0 },
            { x: 40, y: 0 },
        ]);
    });

    it('snaps to the nearest grid point', () => {
        expect(snapToGrid({ x: 1013, y: 757 }, 20)).toEqual({ x: 1020, y: 760 });
    });
});
