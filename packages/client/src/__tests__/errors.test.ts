import { describe, it, expect } from 'vitest';
import {
  ApiAuthenticationError,
  ApiRequestError,
  FireApiError,
  getReadableErrorMessage,
  isFireApiError,
} from '../errors.js';

describe('error classes', () => {
  it('share FireApiError as base with distinct kinds', () => {
    const auth = new ApiAuthenticationError(403);
    const request = new ApiRequestError('boom', 502, 'bad gateway');
    const generic = new FireApiError('broken');

    expect([auth, request, generic].every((e) => e instanceof FireApiError)).toBe(true);
    expect([auth.kind, request.kind, generic.kind]).toEqual(['authentication', 'request', 'client']);
    expect([auth.name, request.name, generic.name]).toEqual(['ApiAuthenticationError', 'ApiRequestError', 'FireApiError']);
  });

  it('keeps the cause', () => {
    const cause = new Error('inner');
    expect(new FireApiError('outer', { cause }).cause).toBe(cause);
  });
});

describe('isFireApiError', () => {
  it('narrows only our errors', () => {
    expect(isFireApiError(new ApiRequestError('x', 500, ''))).toBe(true);
    expect(isFireApiError(new Error('x'))).toBe(false);
    expect(isFireApiError('x')).toBe(false);
  });
});

describe('getReadableErrorMessage', () => {
  it('handles the usual throw shapes', () => {
    expect(getReadableErrorMessage(undefined)).toBe('Unknown error');
    expect(getReadableErrorMessage(null)).toBe('Unknown error');
    expect(getReadableErrorMessage(new Error('  spaced  '))).toBe('spaced');
    expect(getReadableErrorMessage(new TypeError(''))).toBe('TypeError');
    expect(getReadableErrorMessage('plain')).toBe('plain');
    expect(getReadableErrorMessage({ code: 7 })).toBe('{"code":7}');
    expect(getReadableErrorMessage(42)).toBe('42');
  });
});
