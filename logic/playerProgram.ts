import { FrameFile } from '../types';
import { OutputError } from '../utils/errors';

export const PLAYER_LABEL = 'PROG Animation player';

const FIRST_FRAME_RE = /(\d+) LET F=(\d+)/g;
const LAST_FRAME_RE = /(\d+) IF F>(\d+) THE/g;

export interface FrameBounds {
  firstFrame: number; // File number of the first frame, inclusive
  lastFrame: number;  // File number of the last frame, inclusive
}

/**
 * Builds the leading file of an archive: the BASIC program that steps
 * through the frame files numbered firstFrame..lastFrame.
 */
export interface ArchivePlayer {
  file: (bounds: FrameBounds) => FrameFile;
}

/**
 * Player for a 4050-series machine with the R12 graphics ROM. With a delay,
 * each frame triggers the camera on the Option 10 port (@53) and then pauses
 * that many seconds; without one, user key 1 advances.
 */
export const buildPlayerProgram = ({ firstFrame, lastFrame }: FrameBounds, automateDelay = 0): Buffer => {
  const automated = automateDelay > 0;
  const rem = automated ? '' : 'REM ';
  const lines = [
    '1 GO TO 100',
    '4 GO TO 130',
    '100 INIT',
    '110 DIM S$(8190)',
    `120 LET F=${firstFrame - 1}`,
    '130 F=F+1',
    `140 IF F>${lastFrame} THEN 240`,
    '150 FIND@5:F',
    '160 PAGE',
    '170 READ@5:S$',
    `180 IF S$="X" THEN ${automated ? '210' : '260'}`,
    '190 CALL "RDRAW",S$,1,0,0',
    '200 GO TO 170',
    `210 ${rem} PRINT @53:"AAAA"`,
    `220 ${rem} CALL "!PAUSE",${automateDelay}`,
    '230 GO TO 130',
    '240 HOME',
    '250 PRINT "No more frames"',
    '260 END ',
    '',
    ''
  ];
  return Buffer.from(lines.join('\r'), 'ascii');
};

const matchOnce = (program: string, re: RegExp, what: string): RegExpMatchArray => {
  const matches = [...program.matchAll(re)];
  if (matches.length !== 1) throw new OutputError(`Could not find the ${what} frame number in the player program`);
  return matches[0];
};

export const getPlayerProgramBounds = (program: Buffer): FrameBounds => {
  const text = program.toString('latin1');
  const first = matchOnce(text, FIRST_FRAME_RE, 'first');
  const last = matchOnce(text, LAST_FRAME_RE, 'last');
  // The loop increments F before its first read
  return { firstFrame: Number(first[2]) + 1, lastFrame: Number(last[2]) };
};

export const setPlayerProgramBounds = (program: Buffer, { firstFrame, lastFrame }: FrameBounds): Buffer => {
  const text = program.toString('latin1');
  matchOnce(text, FIRST_FRAME_RE, 'first');
  matchOnce(text, LAST_FRAME_RE, 'last');
  const rewritten = text
    .replace(FIRST_FRAME_RE, (_match, line: string) => `${line} LET F=${firstFrame - 1}`)
    .replace(LAST_FRAME_RE, (_match, line: string) => `${line} IF F>${lastFrame} THE`);
  return Buffer.from(rewritten, 'latin1');
};

const toPlayerFile = (data: Buffer): FrameFile => ({ type: 'ASCII', label: PLAYER_LABEL, extension: 'bas', data });

export const isPlayerFile = (file: FrameFile): boolean => {
  return file.type === 'ASCII' && file.label.toLowerCase() === PLAYER_LABEL.toLowerCase();
};

export const createPlayer = (automateDelay = 0): ArchivePlayer => {
  if (!Number.isFinite(automateDelay) || automateDelay < 0) {
    throw new OutputError(`Automation delay must be a non-negative number of seconds, got ${automateDelay}`);
  }
  return { file: bounds => toPlayerFile(buildPlayerProgram(bounds, automateDelay)) };
};

/** Reuses an existing player, keeping its settings and changing only its frame range. */
export const playerFromProgram = (program: Buffer): ArchivePlayer => {
  getPlayerProgramBounds(program);
  return { file: bounds => toPlayerFile(setPlayerProgramBounds(program, bounds)) };
};
