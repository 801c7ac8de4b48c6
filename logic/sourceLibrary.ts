import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Resolution, Scene, Stroke, Timeline, VectorSource, VectorSourceLoader } from '../types';
import { CollaboratorError, describeError } from '../utils/errors';
import { parseHpgl } from '../utils/hpglUtils';
import { multiplyMatrix, transformStrokes } from '../utils/mathUtils';
import { createVectorSource, fitMatrix } from '../utils/strokeUtils';

/** Reads HPGL plot files relative to a base directory. */
export const createFileSourceLoader = (baseDir: string): VectorSourceLoader => async (source) => {
  const filePath = path.resolve(baseDir, source);
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new CollaboratorError(`Could not read source "${source}": ${describeError(err)}`, source);
  }
  return createVectorSource(parseHpgl(text));
};

/** Every vector source a timeline references, loaded once up front. */
export class SourceLibrary {
  private constructor(private readonly sources: Map<string, VectorSource>) {}

  static async load(timeline: Timeline, loader: VectorSourceLoader): Promise<SourceLibrary> {
    const sources = new Map<string, VectorSource>();
    for (const element of timeline.elements) {
      if (sources.has(element.source)) continue;
      let loaded: VectorSource;
      try {
        loaded = await loader(element.source);
      } catch (err) {
        if (err instanceof CollaboratorError) throw err;
        throw new CollaboratorError(`Could not load source "${element.source}": ${describeError(err)}`, element.source);
      }
      if (loaded.strokes.length === 0) console.warn(`Source "${element.source}" has no strokes`);
      sources.set(element.source, loaded);
    }
    return new SourceLibrary(sources);
  }

  get size(): number {
    return this.sources.size;
  }

  get(source: string): VectorSource {
    const loaded = this.sources.get(source);
    if (!loaded) throw new CollaboratorError(`Source "${source}" was not loaded`, source);
    return loaded;
  }
}

/** Resolves a scene into canvas-space strokes, in drawable order. */
export const flattenScene = (scene: Scene, library: SourceLibrary, canvas: Resolution): Stroke[] => {
  const strokes: Stroke[] = [];
  for (const drawable of scene.drawables) {
    switch (drawable.kind) {
      case 'ELEMENT': {
        const source = library.get(drawable.source);
        const m = drawable.fit ? multiplyMatrix(drawable.transform, fitMatrix(source.bounds, canvas)) : drawable.transform;
        strokes.push(...transformStrokes(source.strokes, m));
        break;
      }
      case 'LINE':
        strokes.push([...drawable.points]);
        break;
    }
  }
  return strokes;
};
