import { describe, it, expect } from 'vitest';
import {
  DuplicateKeyError,
  NotFoundError,
  PersistenceError,
  TutorError,
  ValidationError,
} from './tutor-errors';

describe('TutorError', () => {
  it('serializes code, message and details', () => {
    expect(new NotFoundError('session', 'abc').toObject()).toEqual({
      code: 'NOT_FOUND',
      message: 'Session not found: abc',
      data: { entity: 'session', key: 'abc' },
    });
    expect(new ValidationError('Invalid phrase', ['phraseKey: Required', 'context: Required']).toObject()).toEqual({
      code: 'VALIDATION',
      message: 'Invalid phrase: phraseKey: Required; context: Required',
      data: { issues: ['phraseKey: Required', 'context: Required'] },
    });
  });

  it('names errors after their class', () => {
    expect(new DuplicateKeyError('hello').name).toBe('DuplicateKeyError');
    expect(new ValidationError('Invalid settings').message).toBe('Invalid settings');
  });

  it('keeps the underlying cause of persistence failures', () => {
    const cause = new Error('EACCES');
    const error = new PersistenceError('Failed to write vocabulary file: /tmp/v.json', '/tmp/v.json', cause);

    expect(error.cause).toBe(cause);
    expect(error.toObject().data).toEqual({ path: '/tmp/v.json' });
    expect(new PersistenceError('boom', null).cause).toBeUndefined();
  });

  it('narrows unknown values with is()', () => {
    const error: unknown = new DuplicateKeyError('hello');

    expect(TutorError.is(error)).toBe(true);
    expect(DuplicateKeyError.is(error)).toBe(true);
    expect(NotFoundError.is(error)).toBe(false);
    expect(TutorError.is(new Error('plain'))).toBe(false);
  });
});
