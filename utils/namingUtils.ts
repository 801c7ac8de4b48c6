import { FileNaming, FrameFile, ParsedFileName } from '../types';
import { OutputError } from './errors';

const FLASH_DRIVE_NAME_RE = /^(\d+)\s+([A-Z]+)\s+(.*?)\s+(\d+)$/;
const SEQUENCE_NAME_RE = /^frame_(\d+)\.([A-Za-z0-9]+)$/;

/**
 * Tape file names as the flash drive lists them: number (7 columns), type
 * (8 columns), label (21 columns), a space, then the size in bytes.
 *
 *   1      BINARY  DATA Frame 0          812
 */
export const buildFlashDriveName = (number: number, type: string, label: string, size: number): string => {
  if (!Number.isInteger(number) || number < 1 || size < 0) {
    throw new OutputError(`Flash drive file number must be positive and size non-negative (got ${number}, ${size})`);
  }
  return `${number}`.padEnd(7) + type.padEnd(8) + label.padEnd(21) + ' ' + size;
};

export const parseFlashDriveName = (name: string): ParsedFileName & { size: number } | null => {
  const match = FLASH_DRIVE_NAME_RE.exec(name);
  if (!match) return null;
  return { number: Number(match[1]), type: match[2], label: match[3], extension: '', size: Number(match[4]) };
};

export const flashDriveNaming: FileNaming = {
  format: (number, file) => buildFlashDriveName(number, file.type, file.label, file.data.length),
  parse: parseFlashDriveName
};

export const sequenceNaming: FileNaming = {
  format: (number: number, file: FrameFile) => `frame_${String(number).padStart(4, '0')}.${file.extension}`,
  parse: (name: string) => {
    const match = SEQUENCE_NAME_RE.exec(name);
    if (!match) return null;
    return { number: Number(match[1]), type: 'BINARY', label: '', extension: match[2] };
  }
};
