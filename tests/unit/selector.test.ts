import { describe, it, expect } from 'vitest';
import { ALL, parseFilter, shouldUpdate } from '../../scripts/selector.js';

describe('Selector', () => {
  describe('parseFilter', () => {
    it('selects everything without an argument', () => {
      expect(parseFilter(undefined)).toEqual(ALL);
    });

    it('treats an empty argument like no argument', () => {
      expect(parseFilter('')).toEqual(parseFilter(undefined));
    });

    it('treats "." as all', () => {
      expect(parseFilter('.')).toEqual(ALL);
    });

    it('splits comma-separated lists', () => {
      const filter = parseFilter('8,10');

      expect(filter.kind).toBe('subset');
      if (filter.kind === 'subset') {
        expect([...filter.items]).toEqual(['8', '10']);
      }
    });

    it('drops empty entries', () => {
      const filter = parseFilter('slim,,alpine,');

      expect(filter.kind).toBe('subset');
      if (filter.kind === 'subset') {
        expect([...filter.items]).toEqual(['slim', 'alpine']);
      }
    });

    it('falls back to all when only separators are given', () => {
      expect(parseFilter(',,')).toEqual(ALL);
    });
  });

  describe('shouldUpdate', () => {
    const universe = ['8', '10', 'chakracore/10', 'default', 'slim', 'alpine', ''];

    it('accepts every item for the all filter', () => {
      universe.forEach((item) => {
        expect(shouldUpdate(item, ALL)).toBe(true);
      });
    });

    it('accepts exactly the members of a subset', () => {
      const filter = parseFilter('10,slim');

      universe.forEach((item) => {
        expect(shouldUpdate(item, filter)).toBe(item === '10' || item === 'slim');
      });
    });

    it('does not match prefixes', () => {
      const filter = parseFilter('1');

      expect(shouldUpdate('10', filter)).toBe(false);
      expect(shouldUpdate('1', filter)).toBe(true);
    });
  });
});
