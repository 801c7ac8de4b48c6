import { Element, FrameRange, Move, Pose, Timeline, TransformChannel, TransformOp } from '../types';
import { clamp, lerp } from '../utils/mathUtils';

const CHANNELS: TransformChannel[] = ['translate', 'rotate', 'scale'];

// Channel values are stored as pairs; rotate only uses the first slot.
type ChannelValue = [number, number];

interface ChannelMove {
  move: Move;
  op: TransformOp;
}

/** Fraction of a move completed at a frame; a zero-length move is complete at once. */
export const moveProgress = (range: FrameRange, frameIndex: number): number => {
  if (range.end === range.start) return frameIndex >= range.start ? 1 : 0;
  return clamp((frameIndex - range.start) / (range.end - range.start), 0, 1);
};

const readChannel = (pose: Pose, channel: TransformChannel): ChannelValue => {
  switch (channel) {
    case 'translate': return [pose.x, pose.y];
    case 'rotate': return [pose.rotation, 0];
    case 'scale': return [pose.scaleX, pose.scaleY];
  }
};

const writeChannel = (pose: Pose, channel: TransformChannel, [u, v]: ChannelValue) => {
  switch (channel) {
    case 'translate': pose.x = u; pose.y = v; break;
    case 'rotate': pose.rotation = u; break;
    case 'scale': pose.scaleX = u; pose.scaleY = v; break;
  }
};

const targetValue = (from: ChannelValue, op: TransformOp): ChannelValue => {
  switch (op.type) {
    case 'translate': return [from[0] + op.dx, from[1] + op.dy];
    case 'rotate': return [from[0] + op.degrees, 0];
    case 'scale': return [from[0] * op.sx, from[1] * op.sy];
  }
};

/** Moves of one element that drive a channel, by start frame then declaration. */
const channelMoves = (moves: readonly Move[], elementId: string, channel: TransformChannel): ChannelMove[] => {
  const result: ChannelMove[] = [];
  for (const move of moves) {
    if (move.elementId !== elementId) continue;
    const op = move.ops.find(o => o.type === channel);
    if (op) result.push({ move, op });
  }
  return result.sort((a, b) => a.move.range.start - b.move.range.start || a.move.order - b.move.order);
};

/**
 * The move that decides a channel's value: the last declared of those in
 * progress, else the one that finished most recently.
 */
const governingMove = (candidates: ChannelMove[], frameIndex: number): number => {
  let governing = -1;
  let active = false;
  candidates.forEach((c, i) => {
    const { range, order } = c.move;
    if (range.start > frameIndex) return;
    const inProgress = frameIndex <= range.end;
    if (governing < 0) {
      governing = i;
      active = inProgress;
      return;
    }
    const current = candidates[governing].move;
    if (inProgress) {
      if (!active || order > current.order) governing = i;
      active = true;
    } else if (!active) {
      if (range.end > current.range.end || (range.end === current.range.end && order > current.order)) governing = i;
    }
  });
  return governing;
};

const resolveChannel = (
  candidates: ChannelMove[],
  initial: ChannelValue,
  frameIndex: number
): ChannelValue => {
  const memo = new Map<string, ChannelValue>();

  // Value at a frame, considering only the first `count` moves in start order
  const valueAt = (count: number, frame: number): ChannelValue => {
    const key = `${count}:${frame}`;
    const cached = memo.get(key);
    if (cached) return cached;

    const index = governingMove(candidates.slice(0, count), frame);
    let value = initial;
    if (index >= 0) {
      const { move, op } = candidates[index];
      const from = valueAt(index, move.range.start);
      const to = targetValue(from, op);
      const t = moveProgress(move.range, frame);
      value = [lerp(from[0], to[0], t), lerp(from[1], to[1], t)];
    }
    memo.set(key, value);
    return value;
  };

  return valueAt(candidates.length, frameIndex);
};

/** Pose of an element at a frame, each channel resolved on its own. */
export const resolvePose = (timeline: Timeline, element: Element, frameIndex: number): Pose => {
  const pose: Pose = { ...element.pose };
  for (const channel of CHANNELS) {
    const candidates = channelMoves(timeline.moves, element.id, channel);
    if (candidates.length === 0) continue;
    writeChannel(pose, channel, resolveChannel(candidates, readChannel(element.pose, channel), frameIndex));
  }
  return pose;
};
