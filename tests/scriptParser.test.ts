import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { compileScript, compileScriptFile } from '../logic/scriptParser';
import { DeclarationError, ParseError, ScriptError, ScriptRangeError, ScriptSemanticError } from '../utils/errors';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
};

describe('compileScript', () => {
  it('applies defaults to a minimal script', () => {
    const timeline = compileScript('frames 10');
    expect(timeline.totalFrames).toBe(10);
    expect(timeline.frameRate).toBe(25);
    expect(timeline.canvas).toEqual({ width: 1024, height: 780 });
    expect(timeline.elements).toEqual([]);
    expect(timeline.moves).toEqual([]);
    expect(timeline.lines).toEqual([]);
  });

  it('reads every statement', () => {
    const timeline = compileScript([
      '# a plane flies past',
      'frames 50',
      'fps 12.5',
      'canvas 800 600',
      '',
      'element plane plane.hpgl translate 10 -20 rotate 45 scale 2 3 raw visible 5..40 blink 3 1 2',
      'element sun sun.hpgl   # stays put',
      'move plane 0..10 translate 100 0 rotate 90',
      'move plane 10..20 scale 0.5',
      'line 0 0 100 100',
      'line 5..9 1 2 3 4 with plane'
    ].join('\n'));

    expect(timeline.frameRate).toBe(12.5);
    expect(timeline.canvas).toEqual({ width: 800, height: 600 });

    expect(timeline.elements).toEqual([
      {
        id: 'plane',
        source: 'plane.hpgl',
        pose: { x: 10, y: -20, rotation: 45, scaleX: 2, scaleY: 3 },
        fit: false,
        visible: { start: 5, end: 40 },
        blink: { on: 3, off: 1, phase: 2 },
        line: 6
      },
      {
        id: 'sun',
        source: 'sun.hpgl',
        pose: { x: 0, y: 0, rotation: 0, scaleX: 1, scaleY: 1 },
        fit: true,
        line: 7
      }
    ]);

    expect(timeline.moves.map(m => ({ elementId: m.elementId, range: m.range, ops: m.ops, order: m.order, line: m.line }))).toEqual([
      {
        elementId: 'plane',
        range: { start: 0, end: 10 },
        ops: [{ type: 'translate', dx: 100, dy: 0 }, { type: 'rotate', degrees: 90 }],
        order: 0,
        line: 8
      },
      {
        elementId: 'plane',
        range: { start: 10, end: 20 },
        ops: [{ type: 'scale', sx: 0.5, sy: 0.5 }],
        order: 1,
        line: 9
      }
    ]);

    expect(timeline.lines.map(l => ({ from: l.from, to: l.to, range: l.range, elementId: l.elementId }))).toEqual([
      { from: { x: 0, y: 0 }, to: { x: 100, y: 100 }, range: undefined, elementId: undefined },
      { from: { x: 1, y: 2 }, to: { x: 3, y: 4 }, range: { start: 5, end: 9 }, elementId: 'plane' }
    ]);
  });

  it('gives moves and lines distinct ids', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl\nmove a 0..5 rotate 1\nmove a 0..5 rotate 2\nline 0 0 1 1');
    const ids = [...timeline.moves.map(m => m.id), ...timeline.lines.map(l => l.id)];
    expect(new Set(ids).size).toBe(3);
  });

  it('freezes the timeline', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl\nmove a 0..5 translate 1 2');
    expect(Object.isFrozen(timeline)).toBe(true);
    expect(Object.isFrozen(timeline.elements)).toBe(true);
    expect(Object.isFrozen(timeline.elements[0].pose)).toBe(true);
    expect(Object.isFrozen(timeline.moves[0].ops[0])).toBe(true);
  });

  it('lets the caller override the frame rate', () => {
    expect(compileScript('frames 10\nfps 10', { frameRate: 30 }).frameRate).toBe(30);
  });

  it('allows a range to end on the frame count', () => {
    const timeline = compileScript('frames 10\nelement a a.hpgl\nmove a 0..10 rotate 90');
    expect(timeline.moves[0].range).toEqual({ start: 0, end: 10 });
  });

  describe('errors', () => {
    it('rejects a move on an undeclared element', () => {
      const err = captureError(() => compileScript('frames 10\nmove plane 0..5 translate 1 0'));
      expect(err).toBeInstanceOf(DeclarationError);
      expect(err).toBeInstanceOf(ScriptSemanticError);
      expect(err).toBeInstanceOf(ScriptError);
      expect(err).toMatchObject({ line: 2, message: 'line 2: move references undeclared element "plane"' });
    });

    it('rejects a reference to an element declared later', () => {
      const err = captureError(() => compileScript('frames 10\nline 0 0 1 1 with a\nelement a a.hpgl'));
      expect(err).toBeInstanceOf(DeclarationError);
      expect(err).toMatchObject({ line: 2 });
    });

    it('rejects a duplicate element id', () => {
      const err = captureError(() => compileScript('frames 10\nelement a a.hpgl\nelement a b.hpgl'));
      expect(err).toBeInstanceOf(DeclarationError);
      expect(err).toMatchObject({ line: 3, message: 'line 3: element "a" already declared on line 2' });
    });

    it('requires a frames statement', () => {
      const err = captureError(() => compileScript('element a a.hpgl'));
      expect(err).toBeInstanceOf(DeclarationError);
      expect(err).toMatchObject({ line: undefined });
    });

    it('rejects a missing source', () => {
      const err = captureError(() => compileScript('frames 10\nelement a missing.hpgl', { sourceExists: () => false }));
      expect(err).toBeInstanceOf(DeclarationError);
      expect(err).toMatchObject({ line: 2 });
    });

    it('rejects a range that ends before it starts', () => {
      const err = captureError(() => compileScript('frames 10\nelement a a.hpgl\nmove a 5..3 rotate 10'));
      expect(err).toBeInstanceOf(ScriptRangeError);
      expect(err).toMatchObject({ line: 3 });
    });

    it('rejects a negative frame', () => {
      const err = captureError(() => compileScript('frames 10\nelement a a.hpgl\nmove a -1..3 rotate 10'));
      expect(err).toBeInstanceOf(ScriptRangeError);
    });

    it('rejects a range past the frame count, wherever frames is declared', () => {
      const err = captureError(() => compileScript('element a a.hpgl visible 0..11\nframes 10'));
      expect(err).toBeInstanceOf(ScriptRangeError);
      expect(err).toMatchObject({ line: 1, message: 'line 1: frame 11 exceeds the total frame count of 10' });
    });

    it('rejects a non-numeric argument', () => {
      const err = captureError(() => compileScript('frames 10\nelement a a.hpgl\nmove a 0..5 translate x 0'));
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ line: 3 });
    });

    it('rejects a fractional frame range', () => {
      expect(() => compileScript('frames 10\nelement a a.hpgl\nmove a 0..2.5 rotate 1')).toThrow(ParseError);
    });

    it('rejects a move without transforms', () => {
      expect(() => compileScript('frames 10\nelement a a.hpgl\nmove a 0..5')).toThrow(ParseError);
    });

    it('rejects an unknown statement', () => {
      const err = captureError(() => compileScript('frames 10\n\nwobble a'));
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ message: 'line 3: unknown statement "wobble"' });
    });

    it('rejects trailing tokens on a line', () => {
      expect(() => compileScript('frames 10 20')).toThrow(ParseError);
    });

    it('rejects non-positive header values', () => {
      expect(() => compileScript('frames 0')).toThrow(ScriptRangeError);
      expect(() => compileScript('frames 10\nfps 0')).toThrow(ScriptRangeError);
      expect(() => compileScript('frames 10\ncanvas 0 10')).toThrow(ScriptRangeError);
    });

    it('rejects a duplicate header', () => {
      expect(() => compileScript('frames 10\nframes 20')).toThrow(ParseError);
    });

    it('rejects an empty blink cycle', () => {
      expect(() => compileScript('frames 10\nelement a a.hpgl blink 0 2')).toThrow(ScriptRangeError);
    });

    it('rejects numbers too large to represent', () => {
      const err = captureError(() => compileScript('frames 2\nelement a a.hpgl translate 1e999 0'));
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ line: 2, message: 'line 2: translate x 1e999 is too large' });
      expect(() => compileScript('frames 2\nelement a a.hpgl\nmove a 0..1 scale 1e999')).toThrow(
        new ParseError('scale factor 1e999 is too large', 3)
      );
      expect(() => compileScript('frames 99999999999999999999')).toThrow(ParseError);
      expect(() => compileScript('frames 2\nelement a a.hpgl visible 0..99999999999999999999')).toThrow(ParseError);
    });
  });
});

describe('compileScriptFile', () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'vecanim-script-'));
  writeFileSync(path.join(dir, 'plane.hpgl'), 'IN;PU0,0;PD10,0;');

  it('checks sources beside the script', async () => {
    const scriptPath = path.join(dir, 'ok.anim');
    writeFileSync(scriptPath, 'frames 5\nelement plane plane.hpgl\n');
    const { timeline, baseDir } = await compileScriptFile(scriptPath);
    expect(baseDir).toBe(path.resolve(dir));
    expect(timeline.elements.map(e => e.id)).toEqual(['plane']);
  });

  it('fails when a source is missing', async () => {
    const scriptPath = path.join(dir, 'missing.anim');
    writeFileSync(scriptPath, 'frames 5\nelement car car.hpgl\n');
    await expect(compileScriptFile(scriptPath)).rejects.toThrow(DeclarationError);
  });
});
