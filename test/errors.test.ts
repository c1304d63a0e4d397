import { describe, it, expect } from 'vitest';
import {
  AlreadyExistsError,
  BloomError,
  NotFoundError,
  RestoreError,
  StorageError,
} from '../src/index.js';

describe('errors', () => {
  it('should share the BloomError base', () => {
    for (const error of [
      new AlreadyExistsError('bf'),
      new NotFoundError('bf'),
      new RestoreError('bf', 'm', 'bad'),
      new StorageError('bf', 'add', new Error('x')),
    ]) {
      expect(error).toBeInstanceOf(BloomError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('should carry codes', () => {
    expect(new AlreadyExistsError('bf').code).toBe('ALREADY_EXISTS');
    expect(new NotFoundError('bf').code).toBe('NOT_FOUND');
    expect(new RestoreError('bf', 'k', 'bad').code).toBe('RESTORE_ERROR');
  });

  it('should serialize storage errors with their cause', () => {
    const error = new StorageError('bf', 'exists', new Error('socket hang up'));

    expect(error.toJSON()).toEqual({
      name: 'StorageError',
      message: 'exists failed for bloom filter "bf": socket hang up',
      code: 'STORAGE_ERROR',
      cause: 'socket hang up',
      operation: 'exists',
      filterName: 'bf',
    });
  });

  it('should describe non-Error causes', () => {
    expect(new StorageError('bf', 'add', 'NOAUTH').message).toBe(
      'add failed for bloom filter "bf": NOAUTH'
    );
  });
});
