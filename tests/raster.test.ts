import { RasterVideoRenderer } from '../logic/renderers';
import { CollaboratorError, OutputError } from '../utils/errors';
import { buildFfmpegArgs } from '../utils/ffmpegUtils';
import { clipSegment, getPixel, rasterizeStrokes } from '../utils/rasterUtils';
import { FakeVideoEncoder } from './helpers';

const GREEN = [0, 255, 0];
const BLACK = [0, 0, 0];

describe('rasterizeStrokes', () => {
  it('draws green lines on black with y pointing up', () => {
    const frame = rasterizeStrokes([[{ x: 0, y: 0 }, { x: 3, y: 0 }]], { width: 4, height: 2 });
    expect(frame.data.length).toBe(4 * 2 * 3);
    expect([0, 1, 2, 3].map(x => getPixel(frame, x, 0))).toEqual([GREEN, GREEN, GREEN, GREEN]);
    expect(getPixel(frame, 0, 1)).toEqual(BLACK);
    // Canvas y=0 is the last image row
    expect([...frame.data.subarray(12, 15)]).toEqual(GREEN);
  });

  it('steps diagonals one pixel at a time', () => {
    const frame = rasterizeStrokes([[{ x: 0, y: 0 }, { x: 2, y: 2 }]], { width: 3, height: 3 });
    expect([getPixel(frame, 0, 0), getPixel(frame, 1, 1), getPixel(frame, 2, 2)]).toEqual([GREEN, GREEN, GREEN]);
    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
  });

  it('clips lines that leave the image', () => {
    const frame = rasterizeStrokes([[{ x: -5, y: 0 }, { x: 1, y: 0 }]], { width: 2, height: 1 });
    expect([...frame.data]).toEqual([...GREEN, ...GREEN]);
  });

  it('draws a single point as a pixel', () => {
    const frame = rasterizeStrokes([[{ x: 1, y: 0 }]], { width: 2, height: 1 });
    expect([...frame.data]).toEqual([...BLACK, ...GREEN]);
  });

  it('only walks the part of a long segment that is on the image', () => {
    const started = Date.now();
    const frame = rasterizeStrokes([[{ x: 0, y: 0 }, { x: 3e8, y: 0 }]], { width: 16, height: 12 });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(Array.from({ length: 16 }, (_, x) => getPixel(frame, x, 0))).toEqual(Array(16).fill(GREEN));
    expect(getPixel(frame, 0, 1)).toEqual(BLACK);
  });

  it('rejects points without a position', () => {
    expect(() => rasterizeStrokes([[{ x: NaN, y: 0 }, { x: 1, y: 0 }]], { width: 2, height: 1 })).toThrow(CollaboratorError);
  });
});

describe('clipSegment', () => {
  const frame = { width: 4, height: 2 };

  it('keeps a segment that is already on the image', () => {
    const p1 = { x: 0, y: 0 };
    const p2 = { x: 3, y: 1 };
    expect(clipSegment(frame, p1, p2)).toEqual([p1, p2]);
  });

  it('drops a segment that misses the image', () => {
    expect(clipSegment(frame, { x: -5, y: -5 }, { x: -1, y: -5 })).toBeNull();
    expect(clipSegment(frame, { x: 10, y: 0 }, { x: 10, y: 1 })).toBeNull();
  });

  it('trims both ends to the image edges', () => {
    const clipped = clipSegment(frame, { x: -10, y: 0 }, { x: 10, y: 0 });
    expect(clipped?.[0].x).toBeCloseTo(-0.5);
    expect(clipped?.[1].x).toBeCloseTo(3.5);
  });
});

describe('RasterVideoRenderer', () => {
  it('appends frames in order', async () => {
    const encoder = new FakeVideoEncoder();
    const renderer = new RasterVideoRenderer(encoder, { width: 2, height: 1 });
    await renderer.write(0, renderer.encode(0, []));
    await renderer.write(1, renderer.encode(1, [[{ x: 0, y: 0 }]]));
    await renderer.finalize();
    expect(encoder.frames.map(f => [...f.data])).toEqual([[...BLACK, ...BLACK], [...GREEN, ...BLACK]]);
    expect(encoder.finalizeCalls).toBe(1);
  });

  it('rejects a frame that is not the next one', async () => {
    const encoder = new FakeVideoEncoder();
    const renderer = new RasterVideoRenderer(encoder, { width: 2, height: 1 });
    await renderer.write(0, renderer.encode(0, []));
    await expect(renderer.write(2, renderer.encode(2, []))).rejects.toThrow(
      new OutputError('Frame 2 arrived out of order; expected frame 1')
    );
    expect(encoder.frames).toHaveLength(1);
  });
});

describe('buildFfmpegArgs', () => {
  it('reads raw rgb frames from stdin', () => {
    expect(buildFfmpegArgs({
      outputPath: 'out.mp4',
      width: 1024,
      height: 780,
      frameRate: 25,
      codec: { codec: 'mpeg4', pixelFormat: 'yuv420p', ffmpegPath: 'ffmpeg' }
    })).toEqual([
      '-y', '-f', 'rawvideo', '-pix_fmt', 'rgb24', '-s', '1024x780', '-r', '25', '-i', '-',
      '-c:v', 'mpeg4', '-pix_fmt', 'yuv420p', 'out.mp4'
    ]);
  });
});
