export * from './types';
export * from './utils/errors';
export { compileScript, compileScriptFile } from './logic/scriptParser';
export type { CompileOptions, CompiledScriptFile } from './logic/scriptParser';
export { compose, isElementVisible } from './logic/compositor';
export { resolvePose, moveProgress } from './logic/tweening';
export { SourceLibrary, createFileSourceLoader, flattenScene } from './logic/sourceLibrary';
export {
  getDeviceProfile,
  isDeviceProfileName,
  strokesToTek4010,
  strokesToTek4050R12,
  toTapeRecords
} from './logic/deviceEmitters';
export {
  ArchiveSetWriter,
  archiveName,
  archiveSuffix,
  assignArchiveSlot,
  buildArchiveZip,
  createFileArchiveSink,
  packSequence,
  readArchiveFiles,
  rechunkArchive,
  writeArchives
} from './logic/archivePacker';
export type { PackOptions, SequenceFile } from './logic/archivePacker';
export {
  buildPlayerProgram,
  createPlayer,
  getPlayerProgramBounds,
  isPlayerFile,
  playerFromProgram,
  setPlayerProgramBounds
} from './logic/playerProgram';
export type { ArchivePlayer, FrameBounds } from './logic/playerProgram';
export { RasterVideoRenderer, VectorArchiveRenderer } from './logic/renderers';
export type { FrameRenderer } from './logic/renderers';
export { ReorderBuffer, renderInOrder } from './logic/frameScheduler';
export { renderAnimation } from './logic/exporter';
export type { RenderOptions, RenderResult } from './logic/exporter';
export { parseHpgl } from './utils/hpglUtils';
export { flashDriveNaming, sequenceNaming } from './utils/namingUtils';
export { rasterizeStrokes } from './utils/rasterUtils';
export { encodeTGA } from './utils/fileUtils';
export { FfmpegVideoEncoder } from './utils/ffmpegUtils';
