import { Point, RasterFrame, Resolution, Stroke } from '../types';
import { CollaboratorError } from './errors';

export type RGB = [number, number, number];

// Green screen phosphor on black.
export const PHOSPHOR: RGB = [0, 255, 0];

export const createRasterFrame = ({ width, height }: Resolution): RasterFrame => ({
    width,
    height,
    data: Buffer.alloc(width * height * 3)
});

/** Canvas y runs upwards; image rows run downwards. Off-image pixels are dropped. */
export const plotPixel = (frame: RasterFrame, x: number, y: number, color: RGB = PHOSPHOR) => {
    const row = frame.height - 1 - y;
    if (x < 0 || x >= frame.width || row < 0 || row >= frame.height) return;
    const offset = (row * frame.width + x) * 3;
    frame.data[offset] = color[0];
    frame.data[offset + 1] = color[1];
    frame.data[offset + 2] = color[2];
};

/**
 * Liang-Barsky: trims a segment to the area whose points round onto the
 * image. Returns null when nothing of it is left.
 */
export const clipSegment = (frame: Resolution, p1: Point, p2: Point): [Point, Point] | null => {
    const dx = p2.x - p1.x;
    const dy = p2.y - p1.y;
    const edges: [number, number][] = [
        [-dx, p1.x + 0.5],
        [dx, frame.width - 0.5 - p1.x],
        [-dy, p1.y + 0.5],
        [dy, frame.height - 0.5 - p1.y]
    ];

    let t0 = 0;
    let t1 = 1;
    for (const [p, q] of edges) {
        if (p === 0) {
            if (q < 0) return null;
            continue;
        }
        const t = q / p;
        if (p < 0) {
            if (t > t1) return null;
            if (t > t0) t0 = t;
        } else {
            if (t < t0) return null;
            if (t < t1) t1 = t;
        }
    }

    const start = t0 > 0 ? { x: p1.x + t0 * dx, y: p1.y + t0 * dy } : p1;
    const end = t1 < 1 ? { x: p1.x + t1 * dx, y: p1.y + t1 * dy } : p2;
    return [start, end];
};

// Bresenham
export const drawLine = (frame: RasterFrame, p1: Point, p2: Point, color: RGB = PHOSPHOR) => {
    for (const p of [p1, p2]) {
        if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
            throw new CollaboratorError(`Point (${p.x}, ${p.y}) has no screen position`);
        }
    }
    const clipped = clipSegment(frame, p1, p2);
    if (!clipped) return;

    let x0 = Math.round(clipped[0].x), y0 = Math.round(clipped[0].y);
    const x1 = Math.round(clipped[1].x), y1 = Math.round(clipped[1].y);
    const dx = Math.abs(x1 - x0);
    const dy = -Math.abs(y1 - y0);
    const sx = x0 < x1 ? 1 : -1;
    const sy = y0 < y1 ? 1 : -1;
    let err = dx + dy;

    while (true) {
        plotPixel(frame, x0, y0, color);
        if (x0 === x1 && y0 === y1) break;
        const e2 = 2 * err;
        if (e2 >= dy) { err += dy; x0 += sx; }
        if (e2 <= dx) { err += dx; y0 += sy; }
    }
};

export const rasterizeStrokes = (strokes: Stroke[], canvas: Resolution, color: RGB = PHOSPHOR): RasterFrame => {
    const frame = createRasterFrame(canvas);
    for (const stroke of strokes) {
        if (stroke.length === 1) drawLine(frame, stroke[0], stroke[0], color);
        for (let i = 1; i < stroke.length; i++) {
            drawLine(frame, stroke[i - 1], stroke[i], color);
        }
    }
    return frame;
};

export const getPixel = (frame: RasterFrame, x: number, y: number): RGB => {
    const offset = ((frame.height - 1 - y) * frame.width + x) * 3;
    return [frame.data[offset], frame.data[offset + 1], frame.data[offset + 2]];
};
