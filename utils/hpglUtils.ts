import { Point, Stroke } from '../types';

// Arcs are approximated with chords of at most this many degrees.
const ARC_STEP_DEGREES = 4;

interface PenState {
  strokes: Stroke[];
  current: Stroke;
  position: Point;
  down: boolean;
}

const toPoints = (args: number[]): Point[] => {
  const points: Point[] = [];
  for (let i = 0; i + 1 < args.length; i += 2) {
    points.push({ x: args[i], y: args[i + 1] });
  }
  return points;
};

const flush = (pen: PenState) => {
  if (pen.current.length > 0) pen.strokes.push(pen.current);
  pen.current = pen.down ? [pen.position] : [];
};

const penUp = (pen: PenState, points: Point[]) => {
  pen.down = false;
  flush(pen);
  if (points.length > 0) pen.position = points[points.length - 1];
};

const penDown = (pen: PenState, points: Point[]) => {
  pen.down = true;
  if (pen.current.length === 0) pen.current.push(pen.position);
  pen.current.push(...points);
  pen.position = pen.current[pen.current.length - 1];
};

const penMove = (pen: PenState, points: Point[]) => {
  if (pen.down) penDown(pen, points);
  else penUp(pen, points);
};

const arcAbsolute = (pen: PenState, cx: number, cy: number, sweepDegrees: number) => {
  const sweep = sweepDegrees * Math.PI / 180;
  const dx = pen.position.x - cx;
  const dy = pen.position.y - cy;
  const radius = Math.sqrt(dx * dx + dy * dy);
  const theta = Math.atan2(dy, dx);

  const steps = Math.max(1, Math.ceil(Math.abs(sweepDegrees) / ARC_STEP_DEGREES));
  for (let i = 1; i < steps; i++) {
    const angle = theta + sweep * i / steps;
    penMove(pen, [{ x: cx + radius * Math.cos(angle), y: cy + radius * Math.sin(angle) }]);
  }
  penMove(pen, [{ x: cx + radius * Math.cos(theta + sweep), y: cy + radius * Math.sin(theta + sweep) }]);
};

const parseArgs = (text: string): number[] | null => {
  const parts = text.split(/[\s,]+/).filter(Boolean);
  const args = parts.map(Number);
  return args.some(a => !Number.isFinite(a)) ? null : args;
};

/**
 * Reads plotter pen commands into strokes. Only IN, PU, PD, PA, PR and AA are
 * understood; other instructions, and instructions with non-numeric
 * arguments, are skipped.
 */
export const parseHpgl = (text: string): Stroke[] => {
  const pen: PenState = { strokes: [], current: [], position: { x: 0, y: 0 }, down: false };

  for (const statement of text.split(';').map(s => s.trim()).filter(Boolean)) {
    const op = statement.slice(0, 2).toUpperCase();
    const args = parseArgs(statement.slice(2));
    if (!args) continue;

    switch (op) {
      case 'IN':
        flush(pen);
        pen.down = false;
        pen.current = [];
        pen.position = { x: 0, y: 0 };
        break;
      case 'PU':
        penUp(pen, toPoints(args));
        break;
      case 'PD':
        penDown(pen, toPoints(args));
        break;
      case 'PA':
        penMove(pen, toPoints(args));
        break;
      case 'PR': {
        // Each pair is relative to the pen position left by the previous pair
        const points: Point[] = [];
        let { x, y } = pen.position;
        for (const delta of toPoints(args)) {
          x += delta.x;
          y += delta.y;
          points.push({ x, y });
        }
        penMove(pen, points);
        break;
      }
      case 'AA':
        if (args.length >= 3) arcAbsolute(pen, args[0], args[1], args[2]);
        break;
      default:
        break;
    }
  }

  pen.down = false;
  flush(pen);
  return pen.strokes;
};
