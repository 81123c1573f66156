import { describe, it, expect, beforeEach } from 'vitest';
import { registerMorphTool } from './morph.js';
import { SettingsClass } from '../classes/settings.js';

type ToolCallback = (args: Record<string, unknown>) => unknown;

function captureToolCallback(registerFn: (server: any) => void): ToolCallback {
    let cb: ToolCallback | null = null;
    const mockServer = {
        registerTool(_name: string, _config: unknown, callback: ToolCallback) {
            cb = callback;
        },
    };
    registerFn(mockServer);
    if (!cb) throw new Error('registerTool callback not captured');
    return cb;
}

const square = [[0, 0], [2, 0], [2, 2], [0, 2]];
const farSquare = [[10, 10], [12, 10], [12, 12], [10, 12]];

describe('morph tool', () => {
    let handler: ToolCallback;

    beforeEach(() => {
        SettingsClass.reset();
        handler = captureToolCallback(registerMorphTool);
    });

    // ─── align ───────────────────────────────────────────────────────

    it('align rotates the second list onto the first', async () => {
        const result = await handler({
            action: 'align',
            vertices1: square,
            vertices2: [[2, 0], [2, 2], [0, 2], [0, 0]],
        }) as any;

        expect(result.isError).toBeUndefined();
        const data = JSON.parse(result.content[0].text);
        expect(data.aligner).toBe('angular');
        expect(data.vertices1).toEqual(square);
        expect(data.vertices2).toEqual(square);
    });

    it('align picks the aligner from the closure flags', async () => {
        const mixed = await handler({ action: 'align', vertices1: square, vertices2: square, closed1: false }) as any;
        expect(JSON.parse(mixed.content[0].text).aligner).toBe('euclidean');

        const open = await handler({
            action: 'align', vertices1: square, vertices2: square, closed1: false, closed2: false,
        }) as any;
        expect(JSON.parse(open.content[0].text).aligner).toBe('sequential');
    });

    it('align reports a length mismatch', async () => {
        const result = await handler({ action: 'align', vertices1: square, vertices2: square.slice(0, 3) }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe(
            'Vertex lists must have the same length: 4 != 3. Equalize vertex counts before aligning.',
        );
    });

    it('align requires both vertex lists', async () => {
        const result = await handler({ action: 'align', vertices1: square }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Invalid argument: morph align requires "vertices1" and "vertices2".');
    });

    // ─── map_loops ───────────────────────────────────────────────────

    it('map_loops with the simple strategy fades every loop in or out', async () => {
        const result = await handler({
            action: 'map_loops',
            loops1: [{ vertices: square }],
            loops2: [{ vertices: farSquare }],
            strategy: 'simple',
        }) as any;

        const data = JSON.parse(result.content[0].text);
        expect(data.strategy).toBe('simple');
        expect(data.pairs).toBe(2);
        expect(data.loops1).toEqual([
            { vertices: square, closed: true },
            { vertices: [[11, 11], [11, 11], [11, 11], [11, 11]], closed: true },
        ]);
        expect(data.loops2).toEqual([
            { vertices: [[1, 1], [1, 1], [1, 1], [1, 1]], closed: true },
            { vertices: farSquare, closed: true },
        ]);
    });

    it('map_loops rejects an unknown strategy', async () => {
        const result = await handler({
            action: 'map_loops',
            loops1: [{ vertices: square }],
            loops2: [{ vertices: farSquare }],
            strategy: 'nearest',
        }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain("Unknown vertex loop mapper 'nearest'");
    });

    it('map_loops requires both loop lists', async () => {
        const result = await handler({ action: 'map_loops', loops1: [] }) as any;
        expect(result.content[0].text).toBe('Invalid argument: morph map_loops requires "loops1" and "loops2".');
    });

    // ─── interpolate ─────────────────────────────────────────────────

    it('interpolate returns the in-between state', async () => {
        const result = await handler({
            action: 'interpolate',
            shape1: { type: 'circle', radius: 10, numVertices: 16, fillColor: 'red' },
            shape2: { type: 'circle', radius: 10, numVertices: 16, x: 10, fillColor: 'blue' },
            t: 0.5,
        }) as any;

        expect(result.isError).toBeUndefined();
        const data = JSON.parse(result.content[0].text);
        expect(data.t).toBe(0.5);
        expect(data.state.x).toBe(5);
        expect(data.state.fillColor).toBe('#ca0088');
        expect(data.state.contours.outer.vertices).toHaveLength(16);
    });

    it('interpolate applies a named easing to every field', async () => {
        const result = await handler({
            action: 'interpolate',
            shape1: { type: 'circle', radius: 10, numVertices: 16 },
            shape2: { type: 'circle', radius: 10, numVertices: 16, x: 10 },
            t: 0.5,
            easing: 'in_quad',
        }) as any;

        expect(JSON.parse(result.content[0].text).state.x).toBe(2.5);
    });

    it('interpolate reports an unknown easing', async () => {
        const result = await handler({
            action: 'interpolate',
            shape1: { type: 'circle', radius: 10, numVertices: 16 },
            shape2: { type: 'circle', radius: 10, numVertices: 16 },
            t: 0.5,
            easing: 'wobble',
        }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Invalid argument: Unknown easing 'wobble'.");
    });

    it('interpolate rejects shapes with different vertex counts', async () => {
        const result = await handler({
            action: 'interpolate',
            shape1: { type: 'circle', radius: 10, numVertices: 16 },
            shape2: { type: 'rectangle', width: 10, height: 10, numVertices: 24 },
            t: 0.5,
        }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain('Cannot morph shapes with different vertex counts: 16 != 24.');
    });

    it('interpolate requires both shapes and t', async () => {
        const result = await handler({ action: 'interpolate', shape1: { type: 'circle', radius: 1 } }) as any;
        expect(result.content[0].text).toBe('Invalid argument: morph interpolate requires "shape1", "shape2" and "t".');
    });

    // ─── color / angle ───────────────────────────────────────────────

    it('color blends in LAB by default', async () => {
        const result = await handler({ action: 'color', color1: 'red', color2: 'blue', t: 0.5 }) as any;
        expect(JSON.parse(result.content[0].text)).toEqual({ hex: '#ca0088', rgba: [202, 0, 136, 255] });
    });

    it('color honours the requested space', async () => {
        const result = await handler({
            action: 'color', color1: [255, 0, 0], color2: [0, 0, 255], t: 0.5, space: 'rgb',
        }) as any;
        expect(JSON.parse(result.content[0].text)).toEqual({ hex: '#7f007f', rgba: [127, 0, 127, 255] });
    });

    it('color reports an unknown color name', async () => {
        const result = await handler({ action: 'color', color1: 'reddish', color2: 'blue', t: 0.5 }) as any;
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe(
            "Invalid argument: Cannot convert 'reddish' to a color (not hex or a known name).",
        );
    });

    it('angle takes the short way around', async () => {
        const result = await handler({ action: 'angle', start: 350, end: 10, t: 0.5 }) as any;
        expect(JSON.parse(result.content[0].text)).toEqual({ angle: 360 });
    });

    it('angle requires start, end and t', async () => {
        const result = await handler({ action: 'angle', start: 0 }) as any;
        expect(result.content[0].text).toBe('Invalid argument: morph angle requires "start", "end" and "t".');
    });
});
