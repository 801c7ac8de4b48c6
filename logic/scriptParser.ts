import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  Blink,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
  DEFAULT_FPS,
  Element,
  FrameRange,
  IDENTITY_POSE,
  Line,
  Move,
  Pose,
  Resolution,
  Timeline,
  TransformOp
} from '../types';
import { DeclarationError, ParseError, ScriptRangeError } from '../utils/errors';

const NUMBER_RE = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER_RE = /^[-+]?\d+$/;
const RANGE_RE = /^([-+]?\d+)\.\.([-+]?\d+)$/;
const IDENTIFIER_RE = /^[A-Za-z_][\w-]*$/;

export interface CompileOptions {
  /** Existence check for element sources; contents are never read. */
  sourceExists?: (source: string) => boolean;
  /** Overrides the script's `fps` statement. */
  frameRate?: number;
}

interface Header<T> {
  value: T;
  line: number;
}

interface CompileState {
  frames?: Header<number>;
  fps?: Header<number>;
  canvas?: Header<Resolution>;
  elements: Map<string, Element>;
  moves: Move[];
  lines: Line[];
  ranges: { range: FrameRange; line: number }[];
}

class TokenReader {
  private index = 0;

  constructor(private tokens: string[], readonly line: number) {}

  get done(): boolean {
    return this.index >= this.tokens.length;
  }

  peek(): string | undefined {
    return this.tokens[this.index];
  }

  next(what: string): string {
    const token = this.tokens[this.index];
    if (token === undefined) throw new ParseError(`expected ${what}`, this.line);
    this.index++;
    return token;
  }

  number(what: string): number {
    const token = this.next(what);
    if (!NUMBER_RE.test(token)) throw new ParseError(`expected a number for ${what}, got "${token}"`, this.line);
    const value = Number(token);
    if (!Number.isFinite(value)) throw new ParseError(`${what} ${token} is too large`, this.line);
    return value;
  }

  integer(what: string): number {
    const token = this.next(what);
    if (!INTEGER_RE.test(token)) throw new ParseError(`expected an integer for ${what}, got "${token}"`, this.line);
    const value = Number(token);
    if (!Number.isSafeInteger(value)) throw new ParseError(`${what} ${token} is too large`, this.line);
    return value;
  }

  hasNumber(): boolean {
    const token = this.peek();
    return token !== undefined && NUMBER_RE.test(token);
  }

  hasRange(): boolean {
    const token = this.peek();
    return token !== undefined && token.includes('..');
  }

  range(what: string): FrameRange {
    const token = this.next(what);
    const match = RANGE_RE.exec(token);
    if (!match) throw new ParseError(`expected a frame range like 0..10 for ${what}, got "${token}"`, this.line);
    const start = Number(match[1]);
    const end = Number(match[2]);
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new ParseError(`frame range ${token} is too large`, this.line);
    }
    if (start < 0 || end < 0) throw new ScriptRangeError(`frame range ${token} has a negative frame`, this.line);
    if (end < start) throw new ScriptRangeError(`frame range ${token} ends before it starts`, this.line);
    return { start, end };
  }

  identifier(what: string): string {
    const token = this.next(what);
    if (!IDENTIFIER_RE.test(token)) throw new ParseError(`"${token}" is not a valid ${what}`, this.line);
    return token;
  }

  end(): void {
    const token = this.peek();
    if (token !== undefined) throw new ParseError(`unexpected "${token}"`, this.line);
  }
}

const stripComment = (text: string): string => {
  const hash = text.indexOf('#');
  return hash >= 0 ? text.slice(0, hash) : text;
};

const setHeader = <T>(state: CompileState, key: 'frames' | 'fps' | 'canvas', header: Header<T>, assign: (h: Header<T>) => void) => {
  const existing = state[key];
  if (existing) throw new ParseError(`duplicate "${key}" statement (first on line ${existing.line})`, header.line);
  assign(header);
};

const readTransformOp = (reader: TokenReader, keyword: string): TransformOp | null => {
  switch (keyword) {
    case 'translate':
      return { type: 'translate', dx: reader.number('translate x'), dy: reader.number('translate y') };
    case 'rotate':
      return { type: 'rotate', degrees: reader.number('rotate degrees') };
    case 'scale': {
      const sx = reader.number('scale factor');
      const sy = reader.hasNumber() ? reader.number('scale y factor') : sx;
      return { type: 'scale', sx, sy };
    }
    default:
      return null;
  }
};

const readBlink = (reader: TokenReader): Blink => {
  const on = reader.number('blink on frames');
  const off = reader.number('blink off frames');
  const phase = reader.hasNumber() ? reader.number('blink phase') : 0;
  if (on <= 0) throw new ScriptRangeError('blink on frames must be positive', reader.line);
  if (off < 0 || phase < 0) throw new ScriptRangeError('blink frames must not be negative', reader.line);
  return { on, off, phase };
};

const lookupElement = (state: CompileState, id: string, line: number, what: string): Element => {
  const element = state.elements.get(id);
  if (!element) throw new DeclarationError(`${what} references undeclared element "${id}"`, line);
  return element;
};

const parseElement = (reader: TokenReader, state: CompileState, options: CompileOptions) => {
  const id = reader.identifier('element id');
  const source = reader.next('element source');
  const existing = state.elements.get(id);
  if (existing) throw new DeclarationError(`element "${id}" already declared on line ${existing.line}`, reader.line);
  if (options.sourceExists && !options.sourceExists(source)) {
    throw new DeclarationError(`source "${source}" for element "${id}" does not exist`, reader.line);
  }

  const pose: Pose = { ...IDENTITY_POSE };
  const element: Element = { id, source, pose, fit: true, line: reader.line };
  const seen = new Set<string>();

  while (!reader.done) {
    const keyword = reader.next('element option');
    if (seen.has(keyword)) throw new ParseError(`duplicate "${keyword}" option`, reader.line);
    seen.add(keyword);

    const op = readTransformOp(reader, keyword);
    if (op) {
      if (op.type === 'translate') { pose.x = op.dx; pose.y = op.dy; }
      else if (op.type === 'rotate') pose.rotation = op.degrees;
      else { pose.scaleX = op.sx; pose.scaleY = op.sy; }
      continue;
    }

    switch (keyword) {
      case 'raw':
        element.fit = false;
        break;
      case 'visible':
        element.visible = reader.range('visible');
        state.ranges.push({ range: element.visible, line: reader.line });
        break;
      case 'blink':
        element.blink = readBlink(reader);
        break;
      default:
        throw new ParseError(`unknown element option "${keyword}"`, reader.line);
    }
  }

  state.elements.set(id, element);
};

const parseMove = (reader: TokenReader, state: CompileState) => {
  const id = reader.identifier('element id');
  const range = reader.range('move');
  lookupElement(state, id, reader.line, 'move');

  const ops: TransformOp[] = [];
  while (!reader.done) {
    const keyword = reader.next('transform');
    const op = readTransformOp(reader, keyword);
    if (!op) throw new ParseError(`unknown transform "${keyword}"`, reader.line);
    if (ops.some(o => o.type === op.type)) throw new ParseError(`duplicate "${op.type}" in one move`, reader.line);
    ops.push(op);
  }
  if (ops.length === 0) throw new ParseError('move needs at least one transform', reader.line);

  state.ranges.push({ range, line: reader.line });
  state.moves.push({ id: uuidv4(), elementId: id, range, ops, order: state.moves.length, line: reader.line });
};

const parseLine = (reader: TokenReader, state: CompileState) => {
  const range = reader.hasRange() ? reader.range('line') : undefined;
  const from = { x: reader.number('line x1'), y: reader.number('line y1') };
  const to = { x: reader.number('line x2'), y: reader.number('line y2') };

  const line: Line = { id: uuidv4(), from, to, line: reader.line };
  if (range) {
    line.range = range;
    state.ranges.push({ range, line: reader.line });
  }
  if (reader.peek() === 'with') {
    reader.next('with');
    line.elementId = lookupElement(state, reader.identifier('element id'), reader.line, 'line').id;
  }
  reader.end();
  state.lines.push(line);
};

const parseStatement = (reader: TokenReader, state: CompileState, options: CompileOptions) => {
  const keyword = reader.next('statement');
  switch (keyword) {
    case 'frames': {
      const value = reader.integer('frames');
      reader.end();
      if (value < 1) throw new ScriptRangeError('frames must be at least 1', reader.line);
      setHeader(state, 'frames', { value, line: reader.line }, h => { state.frames = h; });
      break;
    }
    case 'fps': {
      const value = reader.number('fps');
      reader.end();
      if (value <= 0) throw new ScriptRangeError('fps must be positive', reader.line);
      setHeader(state, 'fps', { value, line: reader.line }, h => { state.fps = h; });
      break;
    }
    case 'canvas': {
      const width = reader.integer('canvas width');
      const height = reader.integer('canvas height');
      reader.end();
      if (width <= 0 || height <= 0) throw new ScriptRangeError('canvas dimensions must be positive', reader.line);
      setHeader(state, 'canvas', { value: { width, height }, line: reader.line }, h => { state.canvas = h; });
      break;
    }
    case 'element':
      parseElement(reader, state, options);
      break;
    case 'move':
      parseMove(reader, state);
      break;
    case 'line':
      parseLine(reader, state);
      break;
    default:
      throw new ParseError(`unknown statement "${keyword}"`, reader.line);
  }
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

/**
 * Compiles script text into a frozen Timeline. Throws on the first problem;
 * nothing is returned for a script that fails.
 */
export const compileScript = (text: string, options: CompileOptions = {}): Timeline => {
  const state: CompileState = { elements: new Map(), moves: [], lines: [], ranges: [] };

  text.split(/\r?\n/).forEach((raw, i) => {
    const tokens = stripComment(raw).trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) return;
    parseStatement(new TokenReader(tokens, i + 1), state, options);
  });

  if (!state.frames) throw new DeclarationError('script has no "frames" statement');
  const totalFrames = state.frames.value;
  for (const { range, line } of state.ranges) {
    if (range.end > totalFrames) {
      throw new ScriptRangeError(`frame ${range.end} exceeds the total frame count of ${totalFrames}`, line);
    }
  }

  const frameRate = options.frameRate ?? state.fps?.value ?? DEFAULT_FPS;
  if (!(frameRate > 0)) throw new ScriptRangeError('fps must be positive');

  return deepFreeze<Timeline>({
    elements: [...state.elements.values()],
    moves: state.moves,
    lines: state.lines,
    totalFrames,
    frameRate,
    canvas: state.canvas?.value ?? { width: DEFAULT_CANVAS_WIDTH, height: DEFAULT_CANVAS_HEIGHT }
  });
};

export interface CompiledScriptFile {
  timeline: Timeline;
  baseDir: string;
}

/** Compiles a script file; element sources resolve against its directory. */
export const compileScriptFile = async (scriptPath: string, options: CompileOptions = {}): Promise<CompiledScriptFile> => {
  const text = await readFile(scriptPath, 'utf8');
  const baseDir = path.dirname(path.resolve(scriptPath));
  const timeline = compileScript(text, {
    sourceExists: source => existsSync(path.resolve(baseDir, source)),
    ...options
  });
  return { timeline, baseDir };
};
