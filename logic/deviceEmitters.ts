import { DeviceProfile, DeviceProfileName, FrameFile, Point, Resolution, Stroke } from '../types';
import { CollaboratorError } from '../utils/errors';
import { encodeTGA } from '../utils/fileUtils';
import { flashDriveNaming, sequenceNaming } from '../utils/namingUtils';
import { rasterizeStrokes } from '../utils/rasterUtils';

// Both terminals address a 10-bit square, whatever part of it is visible.
const MAX_COORDINATE = 1023;

const TEK4010_GRAPH_MODE = 0x1d;
const TEK4010_ALPHA_MODE = 0x1f;

// Largest payload the flash drive accepts in one tape record.
export const TAPE_RECORD_SIZE = 8175;
// Record holding "X": the player stops loading graphics data here.
const TAPE_END_RECORD = [0x40, 0x01, 0x58, 0x68];

type PointEncoder = (x: number, y: number, startsStroke: boolean) => number[];

const toDeviceCoordinates = (p: Point): [number, number] => {
  if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
    throw new CollaboratorError(`Point (${p.x}, ${p.y}) has no screen position`);
  }
  const x = Math.round(p.x);
  const y = Math.round(p.y);
  if (x < 0 || x > MAX_COORDINATE || y < 0 || y > MAX_COORDINATE) {
    throw new CollaboratorError(
      `Point (${x}, ${y}) is off screen; has something been moved, rotated or scaled out of view?`
    );
  }
  return [x, y];
};

/** A one-point stroke is drawn as a dot: a move then a draw to the same place. */
const encodeStrokes = (strokes: Stroke[], encode: PointEncoder): number[] => {
  const bytes: number[] = [];
  for (const stroke of strokes) {
    if (stroke.length === 0) continue;
    const [x0, y0] = toDeviceCoordinates(stroke[0]);
    bytes.push(...encode(x0, y0, true));
    if (stroke.length === 1) {
      bytes.push(...encode(x0, y0, false));
      continue;
    }
    for (const p of stroke.slice(1)) {
      const [x, y] = toDeviceCoordinates(p);
      bytes.push(...encode(x, y, false));
    }
  }
  return bytes;
};

const encodeTek4010Point: PointEncoder = (x, y, startsStroke) => {
  const bytes = [0x20 | (y >> 5), 0x60 | (y & 0x1f), 0x20 | (x >> 5), 0x40 | (x & 0x1f)];
  return startsStroke ? [TEK4010_GRAPH_MODE, ...bytes] : bytes;
};

const encodeTek4050R12Point: PointEncoder = (x, y, startsStroke) => [
  ((startsStroke ? 1 : 0) << 6) | ((x >> 7) << 3) | (y >> 7),
  x & 0x7f,
  y & 0x7f
];

export const strokesToTek4010 = (strokes: Stroke[]): Buffer => {
  return Buffer.from([...encodeStrokes(strokes, encodeTek4010Point), TEK4010_ALPHA_MODE]);
};

export const strokesToTek4050R12 = (strokes: Stroke[]): Buffer => {
  return Buffer.from(encodeStrokes(strokes, encodeTek4050R12Point));
};

/**
 * Splits R12 command bytes into flash drive tape records. Each record after
 * the first repeats the last point of the one before, flagged as a move, so
 * the pen picks up where it left off.
 */
export const toTapeRecords = (commands: Buffer): Buffer => {
  const records: Buffer[] = [];
  for (let p = 0; p < commands.length; p += TAPE_RECORD_SIZE) {
    records.push(commands.subarray(p, p + TAPE_RECORD_SIZE));
  }
  for (let i = 1; i < records.length; i++) {
    const last = records[i - 1];
    const n = last.length;
    records[i] = Buffer.concat([Buffer.from([last[n - 3] | 0x40, last[n - 2], last[n - 1]]), records[i]]);
  }

  const parts: Buffer[] = [];
  for (const record of records) {
    parts.push(Buffer.from([0x40 | (record.length >> 8), record.length & 0xff]), record, Buffer.from([0]));
  }
  parts.push(Buffer.from(TAPE_END_RECORD));
  return Buffer.concat(parts);
};

const frameLabel = (frameIndex: number) => `DATA Frame ${frameIndex}`;

const tek4010: DeviceProfile = {
  name: 'tek4010',
  naming: sequenceNaming,
  supportsPlayer: false,
  emit: (strokes, frameIndex) => ({
    type: 'BINARY',
    label: frameLabel(frameIndex),
    extension: 'tek',
    data: strokesToTek4010(strokes)
  })
};

const tek4050r12: DeviceProfile = {
  name: 'tek4050r12',
  naming: flashDriveNaming,
  supportsPlayer: true,
  emit: (strokes, frameIndex) => ({
    type: 'BINARY',
    label: frameLabel(frameIndex),
    extension: '',
    data: toTapeRecords(strokesToTek4050R12(strokes))
  })
};

const tga: DeviceProfile = {
  name: 'tga',
  naming: sequenceNaming,
  supportsPlayer: false,
  emit: (strokes: Stroke[], frameIndex: number, canvas: Resolution): FrameFile => ({
    type: 'BINARY',
    label: frameLabel(frameIndex),
    extension: 'tga',
    data: encodeTGA(rasterizeStrokes(strokes, canvas))
  })
};

const DEVICE_PROFILES: Record<DeviceProfileName, DeviceProfile> = { tek4010, tek4050r12, tga };

export const DEVICE_PROFILE_NAMES = Object.keys(DEVICE_PROFILES);

export const isDeviceProfileName = (name: string): name is DeviceProfileName => {
  return Object.prototype.hasOwnProperty.call(DEVICE_PROFILES, name);
};

export const getDeviceProfile = (name: DeviceProfileName): DeviceProfile => DEVICE_PROFILES[name];
