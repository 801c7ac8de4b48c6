import { DeviceProfile, FrameFile, Point, RasterFrame, Resolution, Stroke, VideoEncoder } from '../types';
import { OutputError } from '../utils/errors';
import { rasterizeStrokes } from '../utils/rasterUtils';
import { shiftStrokes } from '../utils/strokeUtils';
import { ArchiveSetWriter } from './archivePacker';

/**
 * Turns a frame's strokes into an output payload, then writes payloads to the
 * output. `encode` may run ahead of order; `write` must see frames 0, 1, 2...
 */
export interface FrameRenderer<T> {
  encode: (frameIndex: number, strokes: Stroke[]) => T;
  write: (frameIndex: number, payload: T) => Promise<void>;
  finalize: () => Promise<void>;
}

abstract class SequentialRenderer<T> implements FrameRenderer<T> {
  private nextFrame = 0;

  abstract encode(frameIndex: number, strokes: Stroke[]): T;
  abstract finalize(): Promise<void>;
  protected abstract append(frameIndex: number, payload: T): Promise<void>;

  async write(frameIndex: number, payload: T): Promise<void> {
    if (frameIndex !== this.nextFrame) {
      throw new OutputError(`Frame ${frameIndex} arrived out of order; expected frame ${this.nextFrame}`);
    }
    await this.append(frameIndex, payload);
    this.nextFrame++;
  }
}

export class RasterVideoRenderer extends SequentialRenderer<RasterFrame> {
  constructor(private readonly encoder: VideoEncoder, private readonly canvas: Resolution) {
    super();
  }

  encode(_frameIndex: number, strokes: Stroke[]): RasterFrame {
    return rasterizeStrokes(strokes, this.canvas);
  }

  protected append(_frameIndex: number, frame: RasterFrame): Promise<void> {
    return this.encoder.append(frame);
  }

  finalize(): Promise<void> {
    return this.encoder.finalize();
  }
}

export class VectorArchiveRenderer extends SequentialRenderer<FrameFile> {
  constructor(
    private readonly profile: DeviceProfile,
    private readonly writer: ArchiveSetWriter,
    private readonly canvas: Resolution,
    private readonly originShift: Point = { x: 0, y: 0 }
  ) {
    super();
  }

  encode(frameIndex: number, strokes: Stroke[]): FrameFile {
    return this.profile.emit(shiftStrokes(strokes, this.originShift, this.canvas), frameIndex, this.canvas);
  }

  protected append(_frameIndex: number, file: FrameFile): Promise<void> {
    return this.writer.add(file);
  }

  async finalize(): Promise<void> {
    await this.writer.close();
  }
}
