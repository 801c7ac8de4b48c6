import { ArchiveSink, FrameFile, RasterFrame, VectorSource, VectorSourceLoader, VideoEncoder } from '../types';
import { createVectorSource } from '../utils/strokeUtils';

export const memorySink = () => {
  const files = new Map<string, Buffer>();
  const sink: ArchiveSink = {
    write: async (name, data) => {
      files.set(name, data);
    }
  };
  return { sink, files };
};

export const memoryLoader = (sources: Record<string, VectorSource>): VectorSourceLoader => async (source) => {
  const loaded = sources[source];
  if (!loaded) throw new Error(`no such source: ${source}`);
  return loaded;
};

// A 10 unit horizontal bar starting at the origin
export const BAR = createVectorSource([[{ x: 0, y: 0 }, { x: 10, y: 0 }]]);

export class FakeVideoEncoder implements VideoEncoder {
  frames: RasterFrame[] = [];
  finalizeCalls = 0;

  async append(frame: RasterFrame): Promise<void> {
    this.frames.push(frame);
  }

  async finalize(): Promise<void> {
    this.finalizeCalls++;
  }
}

export const makeFile = (i: number, extension = 'tek'): FrameFile => ({
  type: 'BINARY',
  label: `DATA Frame ${i}`,
  extension,
  data: Buffer.from(`frame ${i}`)
});
