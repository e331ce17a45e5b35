import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DestinationExistsError,
  InvalidQueryError,
  InvalidRenameError,
  InvalidTransitionError,
  NoteLinkError,
  NotFoundError,
  PartialApplyError,
  StaleLineError,
  errorMessage,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('NotFoundError is a precondition', () => {
    const err = new NotFoundError('/notes/a.md');
    expect(err.classification).toBe('precondition');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.notePath).toBe('/notes/a.md');
    expect(err.message).toBe('Note not found: /notes/a.md');
    expect(err).toBeInstanceOf(NoteLinkError);
    expect(err).toBeInstanceOf(Error);
  });

  it('DestinationExistsError is a precondition', () => {
    const err = new DestinationExistsError('/notes/c.md');
    expect(err.classification).toBe('precondition');
    expect(err.code).toBe('DESTINATION_EXISTS');
    expect(err.destinationPath).toBe('/notes/c.md');
  });

  it('InvalidRenameError, ConfigError and InvalidQueryError are preconditions', () => {
    expect(new InvalidRenameError('empty').code).toBe('INVALID_RENAME');
    expect(new ConfigError('bad').code).toBe('CONFIG_INVALID');
    expect(new ConfigError('bad').classification).toBe('precondition');
    expect(new InvalidQueryError('bad regex').code).toBe('INVALID_QUERY');
  });

  it('StaleLineError is recoverable', () => {
    const err = new StaleLineError('/notes/a.md', 3);
    expect(err.classification).toBe('recoverable');
    expect(err.code).toBe('STALE_LINE');
    expect(err.lineNumber).toBe(3);
    expect(err.message).toBe('Line 3 of /notes/a.md changed on disk since the changeset was computed');
  });

  it('PartialApplyError keeps the cause and the rewritten file count', () => {
    const cause = new Error('EACCES');
    const err = new PartialApplyError('/notes/b.md', '/notes/c.md', 2, { cause });
    expect(err.classification).toBe('recoverable');
    expect(err.code).toBe('PARTIAL_APPLY');
    expect(err.filesRewritten).toBe(2);
    expect(err.cause).toBe(cause);
  });

  it('InvalidTransitionError is a programming error', () => {
    const err = new InvalidTransitionError('applied', 'previewed');
    expect(err.classification).toBe('programming');
    expect(err.message).toBe('Rename transaction cannot move from "applied" to "previewed"');
  });

  it('should set name to the concrete class name', () => {
    expect(new NotFoundError('x').name).toBe('NotFoundError');
  });

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
