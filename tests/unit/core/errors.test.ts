import { describe, it, expect } from 'vitest';
import {
  DecodeError,
  MindError,
  NetworkBindError,
  PersistenceReadError,
  PersistenceWriteError,
  RetryExhaustedError,
  ServiceStoppedError,
  TimeoutError,
  errorMessage,
} from '../../../src/core/errors.js';

describe('Mind errors', () => {
  it('classifies every error with a code', () => {
    const errors: MindError[] = [
      new DecodeError('bad'),
      new PersistenceWriteError('bad'),
      new PersistenceReadError('bad'),
      new NetworkBindError(44444),
      new TimeoutError(10),
      new RetryExhaustedError(3, new Error('boom')),
      new ServiceStoppedError('Peer service'),
    ];

    expect(errors.map((e) => [e.name, e.code])).toEqual([
      ['DecodeError', 'DECODE_FAILED'],
      ['PersistenceWriteError', 'PERSISTENCE_WRITE_FAILED'],
      ['PersistenceReadError', 'PERSISTENCE_READ_FAILED'],
      ['NetworkBindError', 'NETWORK_BIND_FAILED'],
      ['TimeoutError', 'TIMEOUT'],
      ['RetryExhaustedError', 'RETRY_EXHAUSTED'],
      ['ServiceStoppedError', 'SERVICE_STOPPED'],
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(MindError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('formats messages', () => {
    expect(new NetworkBindError(44444).message).toBe('Could not listen on port 44444');
    expect(new TimeoutError(250).message).toBe('Operation timed out after 250ms');
    expect(new ServiceStoppedError('Peer service').message).toBe('Peer service is stopped');
    expect(new RetryExhaustedError(3, new Error('boom')).message).toBe(
      'Gave up after 3 attempts: boom'
    );
  });

  it('keeps the cause', () => {
    const cause = new Error('EADDRINUSE');
    const error = new NetworkBindError(1, { cause });

    expect(error.cause).toBe(cause);
    expect(error.port).toBe(1);
  });

  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('oops'))).toBe('oops');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
