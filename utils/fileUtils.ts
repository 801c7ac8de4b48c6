import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { RasterFrame } from '../types';
import { describeError, OutputError } from './errors';

export const TGA_HEADER_SIZE = 18;

/** Encodes an RGB24 frame as an uncompressed 32-bit TGA. */
export const encodeTGA = (frame: RasterFrame): Buffer => {
    const { width, height, data } = frame;

    // TGA Header (18 bytes)
    const header = Buffer.alloc(TGA_HEADER_SIZE);
    header[2] = 2; // Uncompressed True-Color Image
    header[12] = width & 0xFF;
    header[13] = (width >> 8) & 0xFF;
    header[14] = height & 0xFF;
    header[15] = (height >> 8) & 0xFF;
    header[16] = 32; // 32-bit pixel depth
    header[17] = 0x20; // Top-left origin

    const totalPixels = width * height;
    const content = Buffer.alloc(totalPixels * 4);

    // Frame is RGB. TGA 32-bit is BGRA.
    for (let i = 0; i < totalPixels; i++) {
        const src = i * 3;
        const dst = i * 4;
        content[dst] = data[src + 2];     // Blue
        content[dst + 1] = data[src + 1]; // Green
        content[dst + 2] = data[src];     // Red
        content[dst + 3] = 0xFF;          // Alpha
    }

    return Buffer.concat([header, content]);
};

/**
 * Writes through a temporary file in the same directory and renames it into
 * place, so a reader never sees a half-written file.
 */
export const writeFileAtomic = async (filePath: string, data: Buffer): Promise<void> => {
    const dir = path.dirname(filePath);
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
    try {
        await mkdir(dir, { recursive: true });
        await writeFile(tempPath, data);
        await rename(tempPath, filePath);
    } catch (err) {
        await rm(tempPath, { force: true });
        throw new OutputError(`Could not write ${filePath}: ${describeError(err)}`, filePath);
    }
};
