/**
 * Weekday activity masks
 * Weekday indices run 0 = Monday .. 6 = Sunday
 */

export type WeekdayMask = Set<number>;

const MASK_FILLER = '_';

export const ALL_WEEKDAYS: readonly number[] = [0, 1, 2, 3, 4, 5, 6];

/**
 * Decode a bracketed mask body such as "1,1,1,1,1,0,0" or "1 0 1 0 1 0 1"
 */
export function parseBracketMask(mask: string): WeekdayMask | null {
  const digits = mask.match(/[01]/g) ?? [];
  if (digits.length < 7) return null;

  const weekdays: WeekdayMask = new Set();
  digits.slice(0, 7).forEach((digit, index) => {
    if (digit === '1') weekdays.add(index);
  });
  return weekdays.size > 0 ? weekdays : null;
}

/**
 * Decode an underscore/digit mask such as "111____" (any non-underscore is active)
 */
export function parseUnderscoreMask(mask: string): WeekdayMask | null {
  const positions = mask.trim().slice(0, 7);
  if (positions.length < 7) return null;

  const weekdays: WeekdayMask = new Set();
  Array.from(positions).forEach((char, index) => {
    if (char !== MASK_FILLER) weekdays.add(index);
  });
  return weekdays.size > 0 ? weekdays : null;
}

type MaskSource = (window: string) => WeekdayMask | null;

const maskSources: MaskSource[] = [
  window => {
    const bracket = window.match(/\[([^\]]+)\]/);
    return bracket ? parseBracketMask(bracket[1]) : null;
  },
  // "YEG: 111____"
  window => {
    const baseMask = window.match(/\b[A-Z]{3}:\s*([0-9_]{1,7})/);
    return baseMask ? parseUnderscoreMask(baseMask[1]) : null;
  },
  // "111____ effective"
  window => {
    const nearMask = window.match(/([0-9_]{1,7})\s+effective/i);
    return nearMask ? parseUnderscoreMask(nearMask[1]) : null;
  },
];

/**
 * Resolve the active weekdays for an effective-date window.
 * Falls back to every weekday when no source yields a usable mask.
 */
export function resolveWeekdayMask(window: string): WeekdayMask {
  for (const source of maskSources) {
    const weekdays = source(window);
    if (weekdays) return weekdays;
  }
  return new Set(ALL_WEEKDAYS);
}
