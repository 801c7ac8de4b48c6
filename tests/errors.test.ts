import {
  CollaboratorError,
  DeclarationError,
  describeError,
  FrameRenderError,
  OutputError,
  ParseError,
  RenderCancelledError,
  ScriptError,
  ScriptRangeError,
  ScriptSemanticError
} from '../utils/errors';

describe('errors', () => {
  it('prefixes script errors with their line', () => {
    const err = new ParseError('expected a number', 4);
    expect(err.message).toBe('line 4: expected a number');
    expect(err.name).toBe('ParseError');
    expect(new DeclarationError('no frames').message).toBe('no frames');
  });

  it('groups script errors', () => {
    expect(new ParseError('x', 1)).toBeInstanceOf(ScriptError);
    expect(new ParseError('x', 1)).not.toBeInstanceOf(ScriptSemanticError);
    expect(new ScriptRangeError('x')).toBeInstanceOf(ScriptSemanticError);
    expect(new DeclarationError('x')).toBeInstanceOf(ScriptSemanticError);
  });

  it('carries output context', () => {
    expect(new CollaboratorError('bad plot', 'a.hpgl')).toMatchObject({ name: 'CollaboratorError', source: 'a.hpgl' });
    expect(new OutputError('full', 'out.zip')).toMatchObject({ name: 'OutputError', path: 'out.zip' });
  });

  it('describes render failures', () => {
    const cause = new OutputError('disk full');
    expect(new FrameRenderError(7, cause)).toMatchObject({ frameIndex: 7, cause, message: 'Frame 7 failed: disk full' });
    expect(new RenderCancelledError(3).message).toBe('Rendering cancelled before frame 3');
    expect(describeError('plain')).toBe('plain');
  });
});
