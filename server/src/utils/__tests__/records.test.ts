import { describe, expect, it } from 'vitest';
import { isRecord } from '../records';

describe('isRecord', () => {
  it('should accept plain objects', () => {
    expect(isRecord({ trigger: 'hi' })).toBe(true);
  });

  it('should reject null, arrays and primitives', () => {
    expect(isRecord(null)).toBe(false);
    expect(isRecord(['a'])).toBe(false);
    expect(isRecord('text')).toBe(false);
  });
});
