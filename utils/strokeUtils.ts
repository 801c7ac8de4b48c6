import { Bounds, Matrix, Point, Pose, Resolution, Stroke, VectorSource } from '../types';
import { CollaboratorError } from './errors';
import {
  composeMatrices,
  getStrokesBounds,
  IDENTITY,
  rotationMatrix,
  scaleMatrix,
  transformStrokes,
  translationMatrix
} from './mathUtils';

// Drawable area runs from 0 to width-1 / height-1 so rounded points stay on screen.
const canvasBox = (canvas: Resolution) => ({ dx: canvas.width - 1, dy: canvas.height - 1 });

export const canvasCentre = (canvas: Resolution) => {
    const box = canvasBox(canvas);
    return { x: box.dx / 2, y: box.dy / 2 };
};

export const createVectorSource = (strokes: Stroke[]): VectorSource => ({
    strokes,
    bounds: getStrokesBounds(strokes)
});

/**
 * Centres a drawing in the canvas, with its most constrained dimension
 * stretched across the whole canvas in that dimension.
 */
export const fitMatrix = (bounds: Bounds, canvas: Resolution): Matrix => {
    const box = canvasBox(canvas);
    const strokeDx = bounds.maxX - bounds.minX;
    const strokeDy = bounds.maxY - bounds.minY;

    if (strokeDx === 0 && strokeDy === 0) {
        return translationMatrix(box.dx / 2 - bounds.minX, box.dy / 2 - bounds.minY);
    }

    let scale: number, shiftX: number, shiftY: number;
    if (Math.abs(box.dx * strokeDy / box.dy) > Math.abs(strokeDx)) {
        // Taller than the canvas
        scale = box.dy / strokeDy;
        shiftX = (box.dx - scale * strokeDx) / 2 - scale * bounds.minX;
        shiftY = -scale * bounds.minY;
    } else {
        scale = box.dx / strokeDx;
        shiftX = -scale * bounds.minX;
        shiftY = (box.dy - scale * strokeDy) / 2 - scale * bounds.minY;
    }
    return { a: scale, b: 0, c: 0, d: scale, e: shiftX, f: shiftY };
};

/** Rotation and scale pivot on the canvas centre; translation applies last. */
export const poseMatrix = (pose: Pose, canvas: Resolution): Matrix => {
    const centre = canvasCentre(canvas);
    if (pose.rotation === 0 && pose.scaleX === 1 && pose.scaleY === 1) {
        return pose.x === 0 && pose.y === 0 ? IDENTITY : translationMatrix(pose.x, pose.y);
    }
    return composeMatrices(
        translationMatrix(pose.x, pose.y),
        translationMatrix(centre.x, centre.y),
        rotationMatrix(pose.rotation),
        scaleMatrix(pose.scaleX, pose.scaleY),
        translationMatrix(-centre.x, -centre.y)
    );
};

/** Displaces a whole frame; every point must stay on the canvas. */
export const shiftStrokes = (strokes: Stroke[], shift: Point, canvas: Resolution): Stroke[] => {
    if (shift.x === 0 && shift.y === 0) return strokes;
    const box = canvasBox(canvas);
    const shifted = transformStrokes(strokes, translationMatrix(shift.x, shift.y));
    for (const stroke of shifted) {
        for (const p of stroke) {
            if (!(p.x >= 0 && p.x <= box.dx && p.y >= 0 && p.y <= box.dy)) {
                throw new CollaboratorError(
                    `Origin shift of (${shift.x}, ${shift.y}) pushed a point off screen to (${p.x}, ${p.y})`
                );
            }
        }
    }
    return shifted;
};
