import { PARSER_CONFIG } from './config';

export class InvalidDurationError extends Error {
  constructor(public readonly token: string) {
    super(`Could not parse time string: ${token}`);
    this.name = 'InvalidDurationError';
  }
}

type DurationDecoder = (token: string) => number | null;

// Ordered: first decoder that recognises the token wins
const durationDecoders: DurationDecoder[] = [
  // "25h30", "3h", "3 h 05"
  token => {
    const match = token.match(/^(\d+)\s*h\s*(\d{1,2})?/i);
    if (!match) return null;
    return parseInt(match[1], 10) * 60 + parseInt(match[2] ?? '0', 10);
  },
  token => {
    const match = token.match(/^(\d{1,3})h(\d{2})$/i);
    return match ? parseInt(match[1], 10) * 60 + parseInt(match[2], 10) : null;
  },
  // "3:45"
  token => {
    const match = token.match(/^(\d+):(\d+)$/);
    return match ? parseInt(match[1], 10) * 60 + parseInt(match[2], 10) : null;
  },
  // bare minutes
  token => (/^\d+$/.test(token) ? parseInt(token, 10) : null),
];

/**
 * Convert a duration token ("3h45", "3:45", "225", "25h30(A)") to minutes
 */
export function parseDuration(token: string): number {
  const cleaned = token.replace(/\([^)]*\)/g, '').trim();
  if (cleaned) {
    for (const decode of durationDecoders) {
      const minutes = decode(cleaned);
      if (minutes !== null) return minutes;
    }
  }
  throw new InvalidDurationError(token);
}

export function tryParseDuration(token: string | undefined): number | null {
  if (!token) return null;
  try {
    return parseDuration(token);
  } catch (error) {
    if (error instanceof InvalidDurationError) return null;
    throw error;
  }
}

/**
 * Render minutes as "<hours>h<MM>", or N/A when the value is not a number
 */
export function formatDuration(totalMinutes: number | string): string {
  const value = typeof totalMinutes === 'number' ? totalMinutes : Number(totalMinutes);
  if (typeof totalMinutes === 'string' && totalMinutes.trim() === '') {
    return PARSER_CONFIG.NOT_AVAILABLE;
  }
  if (!Number.isFinite(value)) return PARSER_CONFIG.NOT_AVAILABLE;

  const hours = Math.floor(value / 60);
  const minutes = Math.floor(value - hours * 60);
  return `${hours}h${String(minutes).padStart(2, '0')}`;
}

/**
 * Parse an "HH:MM" time of day to minutes after midnight
 */
export function timeOfDayToMinutes(time: string): number | null {
  const match = time.match(/^(\d{2}):(\d{2})/);
  return match ? parseInt(match[1], 10) * 60 + parseInt(match[2], 10) : null;
}
