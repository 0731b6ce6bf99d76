import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  SourceExhaustedError,
  SourceRejectedError,
  SourceUnavailableError,
  classifyHttpStatus,
  errorMessage,
} from '../../src/lib/errors';

describe('classifyHttpStatus', () => {
  it.each([408, 429, 500, 503])('should treat %i as unavailable', status => {
    const error = classifyHttpStatus('douban', status, 'https://api.example.com/x');
    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error.retryable).toBe(true);
    expect(error.status).toBe(status);
    expect(error.message).toBe(`HTTP ${status} from https://api.example.com/x`);
  });

  it.each([400, 401, 403, 404])('should treat %i as rejected', status => {
    const error = classifyHttpStatus('douban', status, 'https://api.example.com/x');
    expect(error).toBeInstanceOf(SourceRejectedError);
    expect(error.retryable).toBe(false);
  });
});

describe('source errors', () => {
  it('should carry the partial records on exhaustion', () => {
    const records = [{ source: 'mock', sourceId: '1', fields: { title: 'A' }, fetchedAt: '2024-01-01T00:00:00.000Z' }];
    const error = new SourceExhaustedError('mock', records, 5);
    expect(error.records).toBe(records);
    expect(error.retryable).toBe(false);
    expect(error.message).toBe('Source exhausted after 1 of 5 records');
  });
});

describe('ConfigError', () => {
  it('should list issues in the message', () => {
    const error = new ConfigError('Invalid configuration', ['a: bad', 'b: worse']);
    expect(error.message).toBe('Invalid configuration:\n- a: bad\n- b: worse');
    expect(error.issues).toEqual(['a: bad', 'b: worse']);
  });
});

describe('errorMessage', () => {
  it('should handle non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
