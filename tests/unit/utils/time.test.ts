import { describe, it, expect } from 'vitest';
import { parseDuration, parseTime } from '../../../src/utils/time';

describe('Time Utilities', () => {
  describe('parseTime()', () => {
    it('should parse seconds with "s" suffix', () => {
      expect(parseTime('1s')).toBe(1000);
      expect(parseTime('15s')).toBe(15000);
    });

    it('should parse decimal seconds', () => {
      expect(parseTime('0.5s')).toBe(500);
      expect(parseTime('2.25s')).toBe(2250);
    });

    it('should parse milliseconds, minutes and hours', () => {
      expect(parseTime('500ms')).toBe(500);
      expect(parseTime('1m')).toBe(60000);
      expect(parseTime('1h')).toBe(3600000);
    });

    it('should return number input as-is (treated as ms)', () => {
      expect(parseTime(1000)).toBe(1000);
    });

    it('should throw for invalid input', () => {
      expect(() => parseTime('10x')).toThrow('Invalid time format');
      expect(() => parseTime('')).toThrow('Invalid time format');
      expect(() => parseTime('1000')).toThrow('Invalid time format');
      expect(() => parseTime(' 10s ')).toThrow('Invalid time format');
    });
  });

  describe('parseDuration()', () => {
    it('should treat bare numbers as seconds', () => {
      expect(parseDuration(15)).toBe(15000);
      expect(parseDuration('15')).toBe(15000);
      expect(parseDuration('0.5')).toBe(500);
    });

    it('should accept suffixed durations', () => {
      expect(parseDuration('15s')).toBe(15000);
      expect(parseDuration('250ms')).toBe(250);
    });

    it('should reject garbage', () => {
      expect(() => parseDuration('soon')).toThrow('Invalid time format: soon');
    });
  });
});
