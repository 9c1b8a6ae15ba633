import { describe, it, expect } from 'vitest';
import { parseIntervalMs } from '../../src/commands/status.js';
import { InputError } from '../../src/lib/errors.js';

describe('Status Command', () => {
  describe('parseIntervalMs', () => {
    it('should use the fallback when no interval is given', () => {
      expect(parseIntervalMs(undefined, 5000)).toBe(5000);
    });

    it('should convert seconds to milliseconds', () => {
      expect(parseIntervalMs('2', 5000)).toBe(2000);
      expect(parseIntervalMs('0.5', 5000)).toBe(500);
    });

    it.each(['abc', '-1'])('should reject %s', (value) => {
      expect(() => parseIntervalMs(value, 5000)).toThrow(InputError);
    });
  });
});
