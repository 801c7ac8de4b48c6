import { compose, isElementVisible } from '../logic/compositor';
import { compileScript } from '../logic/scriptParser';
import { moveProgress } from '../logic/tweening';
import { Drawable, Pose, Scene } from '../types';
import { ScriptRangeError } from '../utils/errors';

const poseOf = (scene: Scene, elementId: string): Pose => {
  const drawable = scene.drawables.find(d => d.kind === 'ELEMENT' && d.elementId === elementId);
  if (!drawable || drawable.kind !== 'ELEMENT') throw new Error(`${elementId} not in scene`);
  return drawable.pose;
};

const describeDrawable = (d: Drawable) => (d.kind === 'ELEMENT' ? d.elementId : `line ${d.points[0].x}`);

describe('compose', () => {
  const plane = compileScript('frames 20\nelement plane plane.hpgl\nmove plane 0..10 translate 100 0');

  it('moves the plane halfway at frame 5 and holds it after the move', () => {
    expect(poseOf(compose(plane, 5), 'plane')).toEqual({ x: 50, y: 0, rotation: 0, scaleX: 1, scaleY: 1 });
    expect(poseOf(compose(plane, 15), 'plane')).toEqual({ x: 100, y: 0, rotation: 0, scaleX: 1, scaleY: 1 });
  });

  it('reaches the start and target exactly at the move boundaries', () => {
    expect(poseOf(compose(plane, 0), 'plane').x).toBe(0);
    expect(poseOf(compose(plane, 10), 'plane').x).toBe(100);
  });

  it('turns a pure translation into a translation matrix', () => {
    const [drawable] = compose(plane, 5).drawables;
    expect(drawable).toMatchObject({
      kind: 'ELEMENT',
      source: 'plane.hpgl',
      fit: true,
      transform: { a: 1, b: 0, c: 0, d: 1, e: 50, f: 0 }
    });
  });

  it('is deterministic', () => {
    expect(compose(plane, 7)).toEqual(compose(plane, 7));
  });

  it('reports frame time in seconds', () => {
    const scene = compose(plane, 5);
    expect(scene.frameIndex).toBe(5);
    expect(scene.time).toBe(0.2);
  });

  it('rejects frames outside the timeline', () => {
    expect(() => compose(plane, -1)).toThrow(ScriptRangeError);
    expect(() => compose(plane, 20)).toThrow(ScriptRangeError);
    expect(() => compose(plane, 1.5)).toThrow(ScriptRangeError);
  });

  it('starts from the declared pose', () => {
    const timeline = compileScript('frames 5\nelement a a.hpgl translate 5 6 rotate 10 scale 2');
    expect(poseOf(compose(timeline, 3), 'a')).toEqual({ x: 5, y: 6, rotation: 10, scaleX: 2, scaleY: 2 });
  });

  it('chains sequential moves', () => {
    const timeline = compileScript('frames 30\nelement a a.hpgl\nmove a 0..10 translate 100 0\nmove a 10..20 translate 0 50');
    expect(poseOf(compose(timeline, 10), 'a')).toMatchObject({ x: 100, y: 0 });
    expect(poseOf(compose(timeline, 15), 'a')).toMatchObject({ x: 100, y: 25 });
    expect(poseOf(compose(timeline, 25), 'a')).toMatchObject({ x: 100, y: 50 });
  });

  it('lets the last declared move win where moves overlap', () => {
    const timeline = compileScript('frames 30\nelement a a.hpgl\nmove a 0..10 translate 100 0\nmove a 5..15 translate 0 100');
    // The second move starts from where the first had got to at frame 5
    const atEight = poseOf(compose(timeline, 8), 'a');
    expect(atEight.x).toBe(50);
    expect(atEight.y).toBeCloseTo(30);

    const afterBoth = poseOf(compose(timeline, 20), 'a');
    expect(afterBoth.x).toBe(50);
    expect(afterBoth.y).toBe(100);
  });

  it('combines moves on different channels', () => {
    const timeline = compileScript('frames 20\nelement a a.hpgl\nmove a 0..10 rotate 90\nmove a 0..10 translate 10 0');
    expect(poseOf(compose(timeline, 10), 'a')).toEqual({ x: 10, y: 0, rotation: 90, scaleX: 1, scaleY: 1 });
  });

  it('scales multiplicatively from the current scale', () => {
    const timeline = compileScript('frames 20\nelement a a.hpgl scale 2\nmove a 0..10 scale 3');
    expect(poseOf(compose(timeline, 5), 'a')).toMatchObject({ scaleX: 4, scaleY: 4 });
    expect(poseOf(compose(timeline, 10), 'a')).toMatchObject({ scaleX: 6, scaleY: 6 });
  });

  it('applies a zero-length move at once', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl\nmove a 5..5 translate 10 0');
    expect(poseOf(compose(timeline, 4), 'a').x).toBe(0);
    expect(poseOf(compose(timeline, 5), 'a').x).toBe(10);
    expect(poseOf(compose(timeline, 9), 'a').x).toBe(10);
  });

  it('orders elements by declaration, then lines', () => {
    const timeline = compileScript('frames 5\nelement b b.hpgl\nline 7 0 1 1\nelement a a.hpgl');
    expect(compose(timeline, 0).drawables.map(describeDrawable)).toEqual(['b', 'a', 'line 7']);
  });

  it('shows elements only inside their visible range', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl visible 2..4');
    expect([1, 2, 4, 5].map(f => compose(timeline, f).drawables.length)).toEqual([0, 1, 1, 0]);
  });

  it('blinks elements', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl blink 2 1\nelement b b.hpgl blink 2 1 1');
    const [a, b] = timeline.elements;
    expect([0, 1, 2, 3].map(f => isElementVisible(a, f))).toEqual([true, true, false, true]);
    expect([0, 1, 2, 3].map(f => isElementVisible(b, f))).toEqual([true, false, true, true]);
  });

  it('hides a line with its element and outside its range', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl visible 0..3\nline 0 0 5 5 with a\nline 4..6 1 1 2 2');
    const lines = (f: number) => compose(timeline, f).drawables.filter(d => d.kind === 'LINE').length;
    expect([0, 3, 4, 6, 7].map(lines)).toEqual([1, 1, 1, 1, 0]);
  });

  it('keeps line endpoints as declared', () => {
    const timeline = compileScript('frames 3\nline 1 2 3 4');
    expect(compose(timeline, 0).drawables).toEqual([
      { kind: 'LINE', lineId: timeline.lines[0].id, points: [{ x: 1, y: 2 }, { x: 3, y: 4 }] }
    ]);
  });
});

describe('moveProgress', () => {
  it('clamps to the move range', () => {
    const range = { start: 10, end: 20 };
    expect([5, 10, 15, 20, 25].map(f => moveProgress(range, f))).toEqual([0, 0, 0.5, 1, 1]);
  });
});
