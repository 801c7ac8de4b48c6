export interface Point {
  x: number;
  y: number;
}

// A stroke is a run of points joined by straight segments.
export type Stroke = Point[];

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Resolution {
  width: number;
  height: number;
}

// Column-major 2D affine matrix, same layout as SVG's matrix(a b c d e f).
export interface Matrix {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

// --- Script / Timeline Types ---

export interface FrameRange {
  start: number;
  end: number; // Inclusive
}

export interface Pose {
  x: number;
  y: number;
  rotation: number; // Degrees, anticlockwise
  scaleX: number;
  scaleY: number;
}

export type TransformChannel = 'translate' | 'rotate' | 'scale';

export type TransformOp =
  | { type: 'translate'; dx: number; dy: number }
  | { type: 'rotate'; degrees: number }
  | { type: 'scale'; sx: number; sy: number };

export interface Blink {
  on: number;    // Frames visible
  off: number;   // Frames hidden
  phase: number; // Frames into the cycle at frame 0
}

export interface Element {
  id: string;
  source: string;
  pose: Pose;
  fit: boolean; // Scale the source to fill the canvas before posing
  visible?: FrameRange;
  blink?: Blink;
  line: number;
}

export interface Move {
  id: string;
  elementId: string;
  range: FrameRange;
  ops: TransformOp[];
  order: number; // Declaration order among all moves
  line: number;
}

export interface Line {
  id: string;
  from: Point;
  to: Point;
  range?: FrameRange;
  elementId?: string; // Follows this element's visibility, not its transform
  line: number;
}

export interface Timeline {
  readonly elements: readonly Element[];
  readonly moves: readonly Move[];
  readonly lines: readonly Line[];
  readonly totalFrames: number;
  readonly frameRate: number;
  readonly canvas: Resolution;
}

// --- Scene Types ---

export type Drawable =
  | { kind: 'ELEMENT'; elementId: string; source: string; fit: boolean; pose: Pose; transform: Matrix }
  | { kind: 'LINE'; lineId: string; points: [Point, Point] };

export interface Scene {
  frameIndex: number;
  time: number; // Seconds
  drawables: Drawable[];
}

// --- Collaborator Types ---

export interface VectorSource {
  strokes: Stroke[];
  bounds: Bounds;
}

export type VectorSourceLoader = (source: string) => Promise<VectorSource>;

export interface FrameFile {
  type: string;      // Tape file type, e.g. BINARY
  label: string;     // Tape file name, e.g. "DATA Frame 12"
  extension: string;
  data: Buffer;
}

export interface ParsedFileName {
  number: number;
  type: string;
  label: string;
  extension: string;
}

export interface FileNaming {
  format: (number: number, file: FrameFile) => string;
  parse: (name: string) => ParsedFileName | null;
}

export type DeviceProfileName = 'tek4010' | 'tek4050r12' | 'tga';

export interface DeviceProfile {
  name: DeviceProfileName;
  naming: FileNaming;
  supportsPlayer: boolean; // Archives can lead with a player program
  emit: (strokes: Stroke[], frameIndex: number, canvas: Resolution) => FrameFile;
}

export interface RasterFrame {
  width: number;
  height: number;
  data: Buffer; // RGB24, top row first
}

export interface VideoEncoder {
  append: (frame: RasterFrame) => Promise<void>;
  finalize: () => Promise<void>;
}

// --- Output Types ---

export interface VideoCodecParams {
  codec: string;
  pixelFormat: string;
  ffmpegPath: string;
}

export interface PlayerSettings {
  automateDelay: number; // Seconds between frames; 0 waits for a key press
}

export type OutputTarget =
  | { kind: 'RASTER_VIDEO'; codec: VideoCodecParams }
  | {
      kind: 'VECTOR_ARCHIVE_SET';
      maxFilesPerArchive: number;
      deviceProfile: DeviceProfileName;
      firstFileNumber?: number;
      player?: PlayerSettings;
      originShift?: Point; // Moves every frame to spread wear on the screen
    };

export interface ArchiveEntry {
  number: number;
  name: string;
  data: Buffer;
}

export interface PackedArchive {
  index: number;
  name: string;
  entries: ArchiveEntry[];
}

export interface ArchiveSink {
  write: (name: string, data: Buffer) => Promise<void>;
}

export interface RenderProgress {
  frameIndex: number;
  totalFrames: number;
  status: string;
}

export const DEFAULT_FPS = 25;
export const DEFAULT_CANVAS_WIDTH = 1024;
export const DEFAULT_CANVAS_HEIGHT = 780;
export const DEFAULT_ARCHIVE_CAPACITY = 226;
export const DEFAULT_DEVICE_PROFILE: DeviceProfileName = 'tek4050r12';
export const DEFAULT_VIDEO_CODEC = 'mpeg4';
export const DEFAULT_PIXEL_FORMAT = 'yuv420p';
export const DEFAULT_FFMPEG_PATH = 'ffmpeg';

export const IDENTITY_POSE: Pose = { x: 0, y: 0, rotation: 0, scaleX: 1, scaleY: 1 };
