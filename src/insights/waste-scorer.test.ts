import { describe, it, expect } from 'vitest';
import { calculateWasteScore, classifyWaste } from './waste-scorer.js';

describe('waste-scorer', () => {
  describe('calculateWasteScore', () => {
    it('clamps an idle running xlarge instance to 100', () => {
      // 80 + 50 + 60 = 190
      expect(calculateWasteScore(1, 'm5.xlarge', 'running')).toBe(100);
    });

    it('scores a busy instance as 0', () => {
      expect(calculateWasteScore(75, 't3.medium', 'running')).toBe(0);
    });

    it('adds only the overprovisioning rule between 5% and 20%', () => {
      expect(calculateWasteScore(12, 't3.medium', 'running')).toBe(50);
    });

    it('adds the large-instance rule below 30%', () => {
      expect(calculateWasteScore(25, 'c5.2xlarge', 'running')).toBe(60);
    });

    it('matches xlarge case-insensitively', () => {
      expect(calculateWasteScore(25, 'M5.XLARGE', 'running')).toBe(60);
    });

    it('does not apply the idle rule to stopped instances', () => {
      // 50 (cpu < 20) + 40 (stopped)
      expect(calculateWasteScore(0, 't3.small', 'stopped')).toBe(90);
    });

    it('scores a stopped busy-looking instance for billed storage only', () => {
      expect(calculateWasteScore(40, 't3.small', 'stopped')).toBe(40);
    });

    it('treats the thresholds as strict', () => {
      expect(calculateWasteScore(5, 't3.small', 'running')).toBe(50);
      expect(calculateWasteScore(20, 't3.small', 'running')).toBe(0);
      expect(calculateWasteScore(30, 'm5.xlarge', 'running')).toBe(0);
    });

    it('ignores unknown states', () => {
      expect(calculateWasteScore(50, 't3.small', 'terminated')).toBe(0);
    });
  });

  describe('classifyWaste', () => {
    it('uses inclusive lower bounds', () => {
      expect(classifyWaste(80)).toBe('critical');
      expect(classifyWaste(79)).toBe('high');
      expect(classifyWaste(60)).toBe('high');
      expect(classifyWaste(59)).toBe('medium');
      expect(classifyWaste(40)).toBe('medium');
      expect(classifyWaste(39)).toBe('low');
      expect(classifyWaste(20)).toBe('low');
      expect(classifyWaste(19)).toBe('none');
    });

    it('covers the extremes', () => {
      expect(classifyWaste(100)).toBe('critical');
      expect(classifyWaste(0)).toBe('none');
    });
  });
});
