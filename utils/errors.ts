/**
 * Error taxonomy shared by the compiler, the renderers and the packer.
 */

export class ScriptError extends Error {
  line?: number;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message);
    this.name = 'ScriptError';
    this.line = line;
  }
}

/** Malformed directive syntax. */
export class ParseError extends ScriptError {
  constructor(message: string, line: number) {
    super(message, line);
    this.name = 'ParseError';
  }
}

export class ScriptSemanticError extends ScriptError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'ScriptSemanticError';
  }
}

/** A reference to an element or source that was never declared. */
export class DeclarationError extends ScriptSemanticError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'DeclarationError';
  }
}

/** A frame range or value outside what the script allows. */
export class ScriptRangeError extends ScriptSemanticError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'ScriptRangeError';
  }
}

export class CollaboratorError extends Error {
  source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = 'CollaboratorError';
    this.source = source;
  }
}

export class OutputError extends Error {
  path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = 'OutputError';
    this.path = path;
  }
}

export class FrameRenderError extends Error {
  frameIndex: number;
  cause: unknown;

  constructor(frameIndex: number, cause: unknown) {
    super(`Frame ${frameIndex} failed: ${describeError(cause)}`);
    this.name = 'FrameRenderError';
    this.frameIndex = frameIndex;
    this.cause = cause;
  }
}

export class RenderCancelledError extends Error {
  frameIndex: number;

  constructor(frameIndex: number) {
    super(`Rendering cancelled before frame ${frameIndex}`);
    this.name = 'RenderCancelledError';
    this.frameIndex = frameIndex;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
