import { Drawable, Element, Line, Scene, Timeline } from '../types';
import { ScriptRangeError } from '../utils/errors';
import { poseMatrix } from '../utils/strokeUtils';
import { resolvePose } from './tweening';

export const isFrameInRange = (range: { start: number; end: number } | undefined, frameIndex: number): boolean => {
  return !range || (frameIndex >= range.start && frameIndex <= range.end);
};

export const isElementVisible = (element: Element, frameIndex: number): boolean => {
  if (!isFrameInRange(element.visible, frameIndex)) return false;
  const { blink } = element;
  if (!blink) return true;
  return (frameIndex + blink.phase) % (blink.on + blink.off) < blink.on;
};

const isLineVisible = (line: Line, frameIndex: number, visibleElements: Set<string>): boolean => {
  if (!isFrameInRange(line.range, frameIndex)) return false;
  return line.elementId === undefined || visibleElements.has(line.elementId);
};

/**
 * Builds the scene for one frame: elements in declaration order, then lines.
 * Element transforms carry the pose only; fitting a source into the canvas
 * needs its bounds and happens when the scene is flattened.
 */
export const compose = (timeline: Timeline, frameIndex: number): Scene => {
  const last = timeline.totalFrames - 1;
  if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex > last) {
    throw new ScriptRangeError(`frame ${frameIndex} is outside 0..${last}`);
  }

  const drawables: Drawable[] = [];
  const visibleElements = new Set<string>();

  for (const element of timeline.elements) {
    if (!isElementVisible(element, frameIndex)) continue;
    visibleElements.add(element.id);
    const pose = resolvePose(timeline, element, frameIndex);
    drawables.push({
      kind: 'ELEMENT',
      elementId: element.id,
      source: element.source,
      fit: element.fit,
      pose,
      transform: poseMatrix(pose, timeline.canvas)
    });
  }

  for (const line of timeline.lines) {
    if (!isLineVisible(line, frameIndex, visibleElements)) continue;
    drawables.push({ kind: 'LINE', lineId: line.id, points: [{ ...line.from }, { ...line.to }] });
  }

  return { frameIndex, time: frameIndex / timeline.frameRate, drawables };
};
