import { describe, it, expect } from 'vitest';
import { formatRate, humanizeMbps } from '../../../src/utils/units';

describe('humanizeMbps()', () => {
  describe('decimal base', () => {
    it('should report sub-MB rates in KB/s', () => {
      expect(humanizeMbps(4, false)).toBe('500.00 KB/s');
    });

    it('should report rates above the base in GB/s', () => {
      expect(humanizeMbps(16000, false)).toBe('2.00 GB/s');
    });

    it('should keep a value of exactly 1 MB/s in MB/s', () => {
      expect(humanizeMbps(8, false)).toBe('1.00 MB/s');
    });

    it('should keep a value exactly at the base in MB/s', () => {
      expect(humanizeMbps(8000, false)).toBe('1000.00 MB/s');
    });

    it('should report tiny rates in bytes/s', () => {
      expect(humanizeMbps(0.001, false)).toBe('125.00 bytes/s');
    });

    it('should report zero as bytes/s', () => {
      expect(humanizeMbps(0, false)).toBe('0.00 bytes/s');
    });
  });

  describe('binary base', () => {
    it('should scale KB/s by 1024', () => {
      expect(humanizeMbps(4, true)).toBe('512.00 KB/s');
    });

    it('should switch to GB/s only above 1024 MB/s', () => {
      expect(humanizeMbps(8192, true)).toBe('1024.00 MB/s');
      expect(humanizeMbps(16384, true)).toBe('2.00 GB/s');
    });
  });
});

describe('formatRate()', () => {
  it('should print Mbps with two decimals by default', () => {
    expect(formatRate(93.456, false, false)).toBe('93.46 Mbps');
  });

  it('should humanize in byte mode', () => {
    expect(formatRate(80, true, false)).toBe('10.00 MB/s');
  });
});
