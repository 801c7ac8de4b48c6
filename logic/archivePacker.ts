import path from 'node:path';
import JSZip from 'jszip';
import { ArchiveEntry, ArchiveSink, FileNaming, FrameFile, PackedArchive } from '../types';
import { describeError, OutputError } from '../utils/errors';
import { writeFileAtomic } from '../utils/fileUtils';
import { ArchivePlayer, getPlayerProgramBounds, isPlayerFile, playerFromProgram } from './playerProgram';

export interface PackOptions {
  capacity: number;
  naming: FileNaming;
  prefix: string;
  /** Number of the first file in every archive; 1 unless given. */
  firstNumber?: number;
  /** Leads every archive with a program that plays its frames, counted against capacity. */
  player?: ArchivePlayer;
}

/** A file and its position in an ordered sequence. */
export interface SequenceFile {
  number: number;
  file: FrameFile;
}

export interface ArchiveSlot {
  archiveIndex: number;
  number: number; // 1-based within the archive
}

export const validateCapacity = (capacity: number) => {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new OutputError(`Archive capacity must be a positive integer, got ${capacity}`);
  }
};

/** Where the file at a 0-based sequence position lands. */
export const assignArchiveSlot = (position: number, capacity: number): ArchiveSlot => ({
  archiveIndex: Math.floor(position / capacity),
  number: (position % capacity) + 1
});

/** a, b, ..., z, aa, ab, ..., zz, aaa, ... */
export const archiveSuffix = (index: number): string => {
  let suffix = '';
  let n = index + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    suffix = String.fromCharCode(97 + rem) + suffix;
    n = Math.floor((n - 1) / 26);
  }
  return suffix;
};

export const archiveName = (prefix: string, index: number) => `${prefix}${archiveSuffix(index)}.zip`;

interface ArchiveLayout {
  framesPerArchive: number;
  firstFrameNumber: number;
}

const archiveLayout = (options: PackOptions): ArchiveLayout => {
  validateCapacity(options.capacity);
  const firstNumber = options.firstNumber ?? 1;
  if (!Number.isInteger(firstNumber) || firstNumber < 1) {
    throw new OutputError(`First file number must be a positive integer, got ${firstNumber}`);
  }
  if (!options.player) return { framesPerArchive: options.capacity, firstFrameNumber: firstNumber };
  if (options.capacity < 2) {
    throw new OutputError(`Archive capacity must leave room for frames after the player program, got ${options.capacity}`);
  }
  return { framesPerArchive: options.capacity - 1, firstFrameNumber: firstNumber + 1 };
};

const toEntry = (number: number, file: FrameFile, naming: FileNaming): ArchiveEntry => ({
  number,
  name: naming.format(number, file),
  data: file.data
});

const sealArchive = (index: number, frames: ArchiveEntry[], options: PackOptions): PackedArchive => {
  const name = archiveName(options.prefix, index);
  if (!options.player || frames.length === 0) return { index, name, entries: frames };
  const player = options.player.file({ firstFrame: frames[0].number, lastFrame: frames[frames.length - 1].number });
  return { index, name, entries: [toEntry(frames[0].number - 1, player, options.naming), ...frames] };
};

/**
 * Splits an ordered, gap-free sequence of files into archives of at most
 * `capacity` files, renumbering from 1 inside each archive. Everything is
 * checked before any archive is produced.
 */
export const packSequence = (files: SequenceFile[], options: PackOptions): PackedArchive[] => {
  const layout = archiveLayout(options);

  const sorted = [...files].sort((a, b) => a.number - b.number);
  sorted.forEach((entry, i) => {
    if (i > 0) {
      const previous = sorted[i - 1].number;
      if (entry.number === previous) throw new OutputError(`File ${entry.number} appears more than once`);
      if (entry.number !== previous + 1) throw new OutputError(`File ${previous + 1} is missing from the sequence`);
    }
    if (entry.file.data.length === 0) throw new OutputError(`File ${entry.number} is empty`);
  });

  const frames: ArchiveEntry[][] = [];
  sorted.forEach((entry, position) => {
    const slot = assignArchiveSlot(position, layout.framesPerArchive);
    frames[slot.archiveIndex] ??= [];
    frames[slot.archiveIndex].push(toEntry(layout.firstFrameNumber - 1 + slot.number, entry.file, options.naming));
  });
  return frames.map((entries, index) => sealArchive(index, entries, options));
};

export const buildArchiveZip = async (archive: PackedArchive): Promise<Buffer> => {
  const zip = new JSZip();
  archive.entries.forEach(entry => zip.file(entry.name, entry.data));
  return zip.generateAsync({ type: 'nodebuffer', compression: 'STORE' });
};

export const writeArchives = async (archives: PackedArchive[], sink: ArchiveSink): Promise<void> => {
  for (const archive of archives) {
    await sink.write(archive.name, await buildArchiveZip(archive));
  }
};

/** Writes archives below a directory, each through a temporary file. */
export const createFileArchiveSink = (baseDir = '.'): ArchiveSink => ({
  write: (name, data) => writeFileAtomic(path.resolve(baseDir, name), data)
});

/**
 * Packs files as they arrive, writing each archive once it is full. Closing
 * writes whatever is left as a last, shorter archive.
 */
export class ArchiveSetWriter {
  private current: ArchiveEntry[] = [];
  private archiveIndex = 0;
  private count = 0;
  private closed = false;
  private readonly written: PackedArchive[] = [];
  private readonly layout: ArchiveLayout;

  constructor(private readonly sink: ArchiveSink, private readonly options: PackOptions) {
    this.layout = archiveLayout(options);
  }

  get archives(): readonly PackedArchive[] {
    return this.written;
  }

  async add(file: FrameFile): Promise<void> {
    if (this.closed) throw new OutputError('Archive set is already closed');
    if (file.data.length === 0) throw new OutputError(`File ${this.count + 1} is empty`);

    const slot = assignArchiveSlot(this.count, this.layout.framesPerArchive);
    this.current.push(toEntry(this.layout.firstFrameNumber - 1 + slot.number, file, this.options.naming));
    this.count++;
    if (this.current.length === this.layout.framesPerArchive) await this.flush();
  }

  async close(): Promise<readonly PackedArchive[]> {
    if (!this.closed) {
      this.closed = true;
      await this.flush();
    }
    return this.written;
  }

  private async flush() {
    if (this.current.length === 0) return;
    const archive = sealArchive(this.archiveIndex, this.current, this.options);
    this.current = [];
    this.archiveIndex++;
    await this.sink.write(archive.name, await buildArchiveZip(archive));
    this.written.push(archive);
  }
}

/** Reads the numbered files of an existing archive, in any order. */
export const readArchiveFiles = async (zipData: Buffer, naming: FileNaming): Promise<SequenceFile[]> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(zipData);
  } catch (err) {
    throw new OutputError(`Could not read archive: ${describeError(err)}`);
  }

  const files: SequenceFile[] = [];
  for (const entry of Object.values(zip.files)) {
    if (entry.dir) continue;
    const parsed = naming.parse(path.posix.basename(entry.name));
    if (!parsed) throw new OutputError(`Unrecognised file name "${entry.name}" in archive`);
    const data = await entry.async('nodebuffer');
    files.push({
      number: parsed.number,
      file: { type: parsed.type, label: parsed.label, extension: parsed.extension, data }
    });
  }
  return files;
};

/**
 * Re-splits an existing archive exactly as if its files had been packed
 * directly. When the archive carries a player program, only the frames it
 * plays are kept, and each new archive gets a copy of it rewritten for its
 * own frames unless `options.player` replaces it.
 */
export const rechunkArchive = async (zipData: Buffer, options: PackOptions): Promise<PackedArchive[]> => {
  archiveLayout(options);
  const files = await readArchiveFiles(zipData, options.naming);
  const players = files.filter(f => isPlayerFile(f.file));
  if (players.length === 0) return packSequence(files, options);
  if (players.length > 1) throw new OutputError('Archive holds more than one player program');

  const program = players[0].file.data;
  const { firstFrame, lastFrame } = getPlayerProgramBounds(program);
  const frames = files.filter(f => !isPlayerFile(f.file) && f.number >= firstFrame && f.number <= lastFrame);
  const present = new Set(frames.map(f => f.number));
  for (let n = firstFrame; n <= lastFrame; n++) {
    if (!present.has(n)) throw new OutputError(`File ${n} is played by the player program but missing from the archive`);
  }
  return packSequence(frames, { ...options, player: options.player ?? playerFromProgram(program) });
};
