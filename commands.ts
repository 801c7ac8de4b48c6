import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { createFileArchiveSink, rechunkArchive, writeArchives } from './logic/archivePacker';
import { DEVICE_PROFILE_NAMES, getDeviceProfile, isDeviceProfileName } from './logic/deviceEmitters';
import { renderAnimation } from './logic/exporter';
import { createPlayer } from './logic/playerProgram';
import { compileScriptFile } from './logic/scriptParser';
import { createFileSourceLoader } from './logic/sourceLibrary';
import {
  DEFAULT_ARCHIVE_CAPACITY,
  DEFAULT_DEVICE_PROFILE,
  DEFAULT_FFMPEG_PATH,
  DEFAULT_PIXEL_FORMAT,
  DEFAULT_VIDEO_CODEC,
  DeviceProfileName,
  OutputTarget,
  Point
} from './types';

export const USAGE = `Usage:
  vecanim render <script> -o <output> [--kind raster|vector-archive-set] [--fps N]
                 [--device ${DEVICE_PROFILE_NAMES.join('|')}] [--capacity N]
                 [--codec NAME] [--ffmpeg PATH] [--concurrency N]
                 [--player] [--automate SECONDS] [--first-file N] [--origin-shift DX,DY]
  vecanim rechunk <archive.zip> [--prefix PREFIX] [--capacity N] [--device NAME]
                  [--player] [--automate SECONDS] [--first-file N]`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type OutputKind = 'raster' | 'vector-archive-set';

export interface CliOptions {
  command: 'render' | 'rechunk' | 'help';
  input: string;
  output: string;
  prefix?: string;
  kind: OutputKind;
  fps?: number;
  device: DeviceProfileName;
  capacity: number;
  codec: string;
  ffmpeg: string;
  concurrency: number;
  player: boolean;
  automate: number;
  firstFile?: number;
  originShift?: Point;
}

const ORIGIN_SHIFT_RE = /^([-+]?\d+),([-+]?\d+)$/;

const positiveNumber = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value) || value <= 0) {
    throw new UsageError(`Invalid ${flag} value: ${raw}`);
  }
  return value;
};

const positiveInteger = (flag: string, raw: string | undefined): number => {
  const value = positiveNumber(flag, raw);
  if (!Number.isInteger(value)) throw new UsageError(`Invalid ${flag} value: ${raw}`);
  return value;
};

const nonNegativeNumber = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new UsageError(`Invalid ${flag} value: ${raw}`);
  }
  return value;
};

const parseOriginShift = (flag: string, raw: string | undefined): Point => {
  const match = ORIGIN_SHIFT_RE.exec(raw ?? '');
  if (!match) throw new UsageError(`Invalid ${flag} value: ${raw}`);
  return { x: Number(match[1]), y: Number(match[2]) };
};

const requireValue = (flag: string, raw: string | undefined): string => {
  if (raw === undefined || raw.startsWith('-')) throw new UsageError(`Missing value for ${flag}`);
  return raw;
};

export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    command: 'help',
    input: '',
    output: '',
    kind: 'vector-archive-set',
    device: DEFAULT_DEVICE_PROFILE,
    capacity: DEFAULT_ARCHIVE_CAPACITY,
    codec: DEFAULT_VIDEO_CODEC,
    ffmpeg: DEFAULT_FFMPEG_PATH,
    concurrency: 1,
    player: false,
    automate: 0,
  };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--output':
      case '-o':
        options.output = requireValue(arg, argv[++i]);
        break;
      case '--prefix':
        options.prefix = requireValue(arg, argv[++i]);
        break;
      case '--kind': {
        const kind = requireValue(arg, argv[++i]);
        if (kind !== 'raster' && kind !== 'vector-archive-set') throw new UsageError(`Unknown output kind: ${kind}`);
        options.kind = kind;
        break;
      }
      case '--fps':
        options.fps = positiveNumber(arg, argv[++i]);
        break;
      case '--device': {
        const device = requireValue(arg, argv[++i]);
        if (!isDeviceProfileName(device)) throw new UsageError(`Unknown device: ${device}`);
        options.device = device;
        break;
      }
      case '--capacity':
        options.capacity = positiveInteger(arg, argv[++i]);
        break;
      case '--codec':
        options.codec = requireValue(arg, argv[++i]);
        break;
      case '--ffmpeg':
        options.ffmpeg = requireValue(arg, argv[++i]);
        break;
      case '--concurrency':
        options.concurrency = positiveInteger(arg, argv[++i]);
        break;
      case '--player':
        options.player = true;
        break;
      case '--automate':
        options.automate = nonNegativeNumber(arg, argv[++i]);
        options.player = true;
        break;
      case '--first-file':
        options.firstFile = positiveInteger(arg, argv[++i]);
        break;
      case '--origin-shift':
        options.originShift = parseOriginShift(arg, argv[++i]);
        break;
      case '--help':
      case '-h':
        return { ...options, command: 'help' };
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        positionals.push(arg);
    }
  }

  const [command, input, ...extra] = positionals;
  if (command === undefined) return options;
  if (command !== 'render' && command !== 'rechunk') throw new UsageError(`Unknown command: ${command}`);
  if (!input) throw new UsageError(`Missing input file for ${command}`);
  if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);
  if (command === 'render' && !options.output) throw new UsageError('Missing --output path');

  return { ...options, command, input };
};

export const buildOutputTarget = (options: CliOptions): OutputTarget => {
  if (options.kind === 'raster') {
    return {
      kind: 'RASTER_VIDEO',
      codec: { codec: options.codec, pixelFormat: DEFAULT_PIXEL_FORMAT, ffmpegPath: options.ffmpeg },
    };
  }
  return {
    kind: 'VECTOR_ARCHIVE_SET',
    maxFilesPerArchive: options.capacity,
    deviceProfile: options.device,
    firstFileNumber: options.firstFile,
    player: options.player ? { automateDelay: options.automate } : undefined,
    originShift: options.originShift,
  };
};

/** `anim/frames.zip` re-splits into `anim/framesa.zip`, `anim/framesb.zip`, ... */
export const defaultRechunkPrefix = (input: string) => {
  return path.join(path.dirname(input), path.basename(input, path.extname(input)));
};

const render = async (options: CliOptions) => {
  const { timeline, baseDir } = await compileScriptFile(options.input, { frameRate: options.fps });

  const controller = new AbortController();
  const onSigint = () => {
    console.warn('Stopping after the current frame...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await renderAnimation(timeline, buildOutputTarget(options), {
      loader: createFileSourceLoader(baseDir),
      outputPath: options.output,
      concurrency: options.concurrency,
      signal: controller.signal,
      onProgress: progress => console.log(progress.status),
    });
    result.outputs.forEach(output => console.log(`Wrote ${output}`));
  } finally {
    process.off('SIGINT', onSigint);
  }
};

const rechunk = async (options: CliOptions) => {
  const profile = getDeviceProfile(options.device);
  if (options.player && !profile.supportsPlayer) throw new UsageError(`The ${profile.name} device has no player program`);
  const archives = await rechunkArchive(await readFile(options.input), {
    capacity: options.capacity,
    naming: profile.naming,
    prefix: options.prefix ?? defaultRechunkPrefix(options.input),
    firstNumber: options.firstFile,
    player: options.player ? createPlayer(options.automate) : undefined,
  });
  await writeArchives(archives, createFileArchiveSink());
  archives.forEach(archive => console.log(`Wrote ${archive.name} (${archive.entries.length} files)`));
};

export const main = async (argv: string[]): Promise<void> => {
  const options = parseArgs(argv);
  switch (options.command) {
    case 'render':
      return render(options);
    case 'rechunk':
      return rechunk(options);
    case 'help':
      console.log(USAGE);
  }
};
