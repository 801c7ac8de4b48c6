import {
  ArchiveSink,
  OutputTarget,
  RenderProgress,
  Timeline,
  VectorSourceLoader,
  VideoEncoder
} from '../types';
import { OutputError } from '../utils/errors';
import { FfmpegVideoEncoder, FfmpegVideoOptions } from '../utils/ffmpegUtils';
import { ArchiveSetWriter, createFileArchiveSink } from './archivePacker';
import { compose } from './compositor';
import { getDeviceProfile } from './deviceEmitters';
import { createPlayer } from './playerProgram';
import { renderInOrder } from './frameScheduler';
import { FrameRenderer, RasterVideoRenderer, VectorArchiveRenderer } from './renderers';
import { flattenScene, SourceLibrary } from './sourceLibrary';

export interface RenderOptions {
  loader: VectorSourceLoader;
  /** Video file path, or the name prefix of an archive set. */
  outputPath: string;
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: RenderProgress) => void;
  archiveSink?: ArchiveSink;
  createVideoEncoder?: (options: FfmpegVideoOptions) => VideoEncoder;
}

export interface RenderResult {
  frames: number;
  outputs: string[];
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled output target: ${JSON.stringify(value)}`);
};

const runRenderer = async <T>(
  timeline: Timeline,
  library: SourceLibrary,
  renderer: FrameRenderer<T>,
  options: RenderOptions
): Promise<number> => {
  let frames: number;
  try {
    frames = await renderInOrder(
      timeline.totalFrames,
      frameIndex => renderer.encode(frameIndex, flattenScene(compose(timeline, frameIndex), library, timeline.canvas)),
      (frameIndex, payload) => renderer.write(frameIndex, payload),
      options
    );
  } catch (err) {
    // Flush what was written, then report the first failure
    try {
      await renderer.finalize();
    } catch (finalizeErr) {
      console.error('Failed to finalize output after an error:', finalizeErr);
    }
    throw err;
  }
  await renderer.finalize();
  return frames;
};

/**
 * Renders every frame of a timeline to one output target. All sources are
 * loaded before any output is opened, and the output is finalized however
 * the run ends.
 */
export const renderAnimation = async (
  timeline: Timeline,
  target: OutputTarget,
  options: RenderOptions
): Promise<RenderResult> => {
  const library = await SourceLibrary.load(timeline, options.loader);
  const { canvas } = timeline;

  switch (target.kind) {
    case 'RASTER_VIDEO': {
      const createEncoder = options.createVideoEncoder ?? ((opts: FfmpegVideoOptions) => new FfmpegVideoEncoder(opts));
      const encoder = createEncoder({
        outputPath: options.outputPath,
        width: canvas.width,
        height: canvas.height,
        frameRate: timeline.frameRate,
        codec: target.codec
      });
      const frames = await runRenderer(timeline, library, new RasterVideoRenderer(encoder, canvas), options);
      return { frames, outputs: [options.outputPath] };
    }
    case 'VECTOR_ARCHIVE_SET': {
      const profile = getDeviceProfile(target.deviceProfile);
      if (target.player && !profile.supportsPlayer) {
        throw new OutputError(`The ${profile.name} profile has no player program`);
      }
      const writer = new ArchiveSetWriter(options.archiveSink ?? createFileArchiveSink(), {
        capacity: target.maxFilesPerArchive,
        naming: profile.naming,
        prefix: options.outputPath,
        firstNumber: target.firstFileNumber,
        player: target.player && createPlayer(target.player.automateDelay)
      });
      const renderer = new VectorArchiveRenderer(profile, writer, canvas, target.originShift);
      const frames = await runRenderer(timeline, library, renderer, options);
      return { frames, outputs: writer.archives.map(a => a.name) };
    }
    default:
      return assertNever(target);
  }
};
