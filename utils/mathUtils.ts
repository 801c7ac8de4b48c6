import { Point, Matrix, Bounds, Stroke } from '../types';

// --- Basic Math Helpers ---

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

export const clamp = (v: number, min: number, max: number): number => Math.min(max, Math.max(min, v));

export const toRadians = (degrees: number): number => degrees * Math.PI / 180;

// --- Affine Matrices ---

export const IDENTITY: Matrix = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

export const translationMatrix = (tx: number, ty: number): Matrix => ({ a: 1, b: 0, c: 0, d: 1, e: tx, f: ty });

export const scaleMatrix = (sx: number, sy: number): Matrix => ({ a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 });

export const rotationMatrix = (degrees: number): Matrix => {
    const theta = toRadians(degrees);
    const cos = Math.cos(theta);
    const sin = Math.sin(theta);
    return { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
};

/** Product m1 · m2: applying the result equals applying m2, then m1. */
export const multiplyMatrix = (m1: Matrix, m2: Matrix): Matrix => ({
    a: m1.a * m2.a + m1.c * m2.b,
    b: m1.b * m2.a + m1.d * m2.b,
    c: m1.a * m2.c + m1.c * m2.d,
    d: m1.b * m2.c + m1.d * m2.d,
    e: m1.a * m2.e + m1.c * m2.f + m1.e,
    f: m1.b * m2.e + m1.d * m2.f + m1.f
});

/** Multiplies left to right, so the last matrix is applied first. */
export const composeMatrices = (...matrices: Matrix[]): Matrix => {
    return matrices.reduce((acc, m) => multiplyMatrix(acc, m), IDENTITY);
};

export const applyMatrix = (m: Matrix, p: Point): Point => ({
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f
});

export const transformStrokes = (strokes: Stroke[], m: Matrix): Stroke[] => {
    return strokes.map(stroke => stroke.map(p => applyMatrix(m, p)));
};

// --- Bounds ---

export const getStrokesBounds = (strokes: Stroke[]): Bounds => {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const stroke of strokes) {
        for (const p of stroke) {
            if (p.x < minX) minX = p.x;
            if (p.y < minY) minY = p.y;
            if (p.x > maxX) maxX = p.x;
            if (p.y > maxY) maxY = p.y;
        }
    }
    if (minX === Infinity) return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
    return { minX, minY, maxX, maxY };
};
