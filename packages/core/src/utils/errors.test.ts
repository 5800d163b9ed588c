import { describe, it, expect } from 'vitest';
import { toErrorMessage, errorName } from './errors.js';

describe('toErrorMessage', () => {
  it('returns message from Error instance', () => {
    expect(toErrorMessage(new Error('oops'))).toBe('oops');
  });

  it('returns thrown strings as-is', () => {
    expect(toErrorMessage('string error')).toBe('string error');
  });

  it('returns "Unknown error" for other values', () => {
    expect(toErrorMessage(42)).toBe('Unknown error');
    expect(toErrorMessage(null)).toBe('Unknown error');
    expect(toErrorMessage(undefined)).toBe('Unknown error');
  });
});

describe('errorName', () => {
  it('returns the name of Error subclasses', () => {
    expect(errorName(new TypeError('bad'))).toBe('TypeError');
  });

  it('returns undefined for non-errors', () => {
    expect(errorName({ name: 'Fake' })).toBeUndefined();
  });
});
