import {
  parseBracketMask,
  parseUnderscoreMask,
  resolveWeekdayMask,
} from '../weekdayMask';

function sorted(mask: Set<number> | null): number[] | null {
  return mask ? Array.from(mask).sort((a, b) => a - b) : null;
}

describe('Weekday masks', () => {
  describe('parseBracketMask', () => {
    it('should read comma and space separated digits', () => {
      expect(sorted(parseBracketMask('1,1,1,1,1,0,0'))).toEqual([0, 1, 2, 3, 4]);
      expect(sorted(parseBracketMask('1 0 1 0 1 0 1'))).toEqual([0, 2, 4, 6]);
    });

    it('should return null for short or inactive masks', () => {
      expect(parseBracketMask('1,1')).toBeNull();
      expect(parseBracketMask('0,0,0,0,0,0,0')).toBeNull();
    });
  });

  describe('parseUnderscoreMask', () => {
    it('should treat any non-underscore as active', () => {
      expect(sorted(parseUnderscoreMask('111____'))).toEqual([0, 1, 2]);
      expect(sorted(parseUnderscoreMask('1_1_1__'))).toEqual([0, 2, 4]);
      expect(sorted(parseUnderscoreMask('_____67'))).toEqual([5, 6]);
    });

    it('should return null for short or empty masks', () => {
      expect(parseUnderscoreMask('11')).toBeNull();
      expect(parseUnderscoreMask('_______')).toBeNull();
    });
  });

  describe('resolveWeekdayMask', () => {
    it('should prefer a bracketed mask', () => {
      const window = 'YEG: 111____ effective JUL 01-JUL 31 [0,0,0,0,0,1,1]';
      expect(sorted(resolveWeekdayMask(window))).toEqual([5, 6]);
    });

    it('should read a base-prefixed mask', () => {
      expect(sorted(resolveWeekdayMask('YEG: 111____ effective SEP 01-SEP 30'))).toEqual([0, 1, 2]);
    });

    it('should read a mask just before "effective"', () => {
      expect(sorted(resolveWeekdayMask('1_1____ effective SEP 01-SEP 30'))).toEqual([0, 2]);
    });

    it('should fall through unusable sources', () => {
      const window = '[0,0,0,0,0,0,0] YEG: ___4___ effective SEP 01-SEP 30';
      expect(sorted(resolveWeekdayMask(window))).toEqual([3]);
    });

    it('should default to every weekday', () => {
      expect(sorted(resolveWeekdayMask('effective SEP 01-SEP 30'))).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });
  });
});
