import type { Layover, Leg, Trip } from '../shared/schema';
import { PARSER_CONFIG } from './config';
import { tryParseDuration } from './durationCodec';
import { determineEffectiveYear, MONTH_MAP, parseOperatingDates } from './operatingCalendar';
import { deriveTripAttributes, roundTo2, sortedDayNumbers, type TripDays } from './tripAttributes';

export interface TripHeader {
  tripNumber: string;
  pairingNumber: string;
  base: string | null;
}

export interface ExtractionOptions {
  referenceDate: Date;
}

// "  1  AC123  YYC YVR 08:00 10:00 2h00"
const LEG_PATTERN =
  /\s+(\d{1,2})\s+([A-Z0-9_]{2,9})\s+([A-Z]{3})\s+([A-Z]{3})\s+(\d{2}:\d{2})\s+(\d{2}:\d{2})\s+(\d{1,3}h\d{2}|\d{1,2}:\d{2})/i;
const LEG_PATTERN_GLOBAL = new RegExp(LEG_PATTERN.source, 'gi');

const TRIP_HEAD = /TRIP\s*#\s*(\S+)\s+(\S+)(.*)/i;
const TAFB_RE = /TAFB:\s*([\d+h()\w:]+)/i;
const CREDIT_RE = /Credit Time:\s*([^\s,]+)/i;
const PERDIEM_RE = /PERDIEM:\s*([\d.,]+)/i;

const LAYOVER_MARKER = /----\s+([A-Z]{3})\b/i;
const LAYOVER_CUE = /\b(hotel|overnight|layover)\b/i;
const LAYOVER_DURATION = /(\d{1,3}h\d{2})/i;

export function containsLegLine(text: string): boolean {
  return LEG_PATTERN.test(text);
}

type BaseDecoder = (headerRest: string) => string | null;

const baseDecoders: BaseDecoder[] = [
  // "(YYC)"
  rest => rest.match(/\(([A-Z]{3})\)/)?.[1] ?? null,
  rest => {
    for (const match of rest.matchAll(/\b([A-Z]{3})\b/g)) {
      if (!(match[1] in MONTH_MAP)) return match[1];
    }
    return null;
  },
];

/**
 * Resolve trip number, pairing number and base from the "TRIP #" header.
 * Returns null when the block has no header at all.
 */
export function parseTripHeader(block: string): TripHeader | null {
  const header = block.match(TRIP_HEAD);
  if (!header) return null;

  let base: string | null = null;
  for (const decode of baseDecoders) {
    base = decode(header[3]);
    if (base) break;
  }

  return { tripNumber: header[1], pairingNumber: header[2], base };
}

function isDeadheadFlight(flightNumber: string): boolean {
  return PARSER_CONFIG.DEADHEAD_PREFIXES.some(prefix => flightNumber.startsWith(prefix));
}

export interface ExtractedLegs {
  days: TripDays;
  legs: Leg[]; // Document order
}

/**
 * Collect every flight leg in document order, grouped by day of trip
 */
export function extractLegs(block: string): ExtractedLegs {
  const days: TripDays = {};
  const legs: Leg[] = [];

  for (const match of block.matchAll(LEG_PATTERN_GLOBAL)) {
    const day = parseInt(match[1], 10);
    const originalFlightNumber = match[2].toUpperCase();
    const isDeadhead = isDeadheadFlight(originalFlightNumber);

    const leg: Leg = {
      day,
      flightNumber: isDeadhead ? PARSER_CONFIG.DEADHEAD_PLACEHOLDER : originalFlightNumber,
      originalFlightNumber,
      depStation: match[3].toUpperCase(),
      arrStation: match[4].toUpperCase(),
      depTime: match[5],
      arrTime: match[6],
      duration: match[7],
      isDeadhead,
    };

    const key = String(day);
    if (!days[key]) days[key] = [];
    days[key].push(leg);
    legs.push(leg);
  }

  return { days, legs };
}

export function formatDeadheadLeg(leg: Leg): string {
  return `${leg.flightNumber}    ${leg.depStation} ${leg.arrStation} ${leg.depTime} ${leg.arrTime}  ${leg.duration}`;
}

/**
 * Whether the trip opens with a deadhead, or failing that closes with one
 */
export function deadheadEdges(days: TripDays): {
  startsOrEndsWithDeadhead: boolean;
  startsWithDeadheadToReferenceStation: boolean;
} {
  const dayNumbers = sortedDayNumbers(days);
  if (dayNumbers.length === 0) {
    return { startsOrEndsWithDeadhead: false, startsWithDeadheadToReferenceStation: false };
  }

  const firstLeg = days[String(dayNumbers[0])][0];
  if (firstLeg?.isDeadhead) {
    return {
      startsOrEndsWithDeadhead: true,
      startsWithDeadheadToReferenceStation:
        firstLeg.arrStation === PARSER_CONFIG.DEADHEAD_REFERENCE_STATION,
    };
  }

  const lastDayLegs = days[String(dayNumbers[dayNumbers.length - 1])];
  const lastLeg = lastDayLegs[lastDayLegs.length - 1];
  return {
    startsOrEndsWithDeadhead: lastLeg?.isDeadhead ?? false,
    startsWithDeadheadToReferenceStation: false,
  };
}

/**
 * Scan line by line for rest periods.
 * Marker lines ("---- YVR ... hotel") are taken as-is; cue-only lines must
 * name a station and, when timed, last long enough to be a real rest.
 */
export function extractLayovers(block: string): Layover[] {
  const layovers: Layover[] = [];

  for (const raw of block.split(/\r?\n/)) {
    const line = raw.trimEnd();
    if (!LAYOVER_CUE.test(line)) continue;

    const duration = line.match(LAYOVER_DURATION)?.[1];
    const marker = line.match(LAYOVER_MARKER);
    if (marker) {
      layovers.push({
        location: marker[1].toUpperCase(),
        duration: duration ?? PARSER_CONFIG.NOT_AVAILABLE,
      });
      continue;
    }

    const station = line.match(/\b([A-Z]{3})\b/);
    if (!station) continue;

    if (duration === undefined) {
      layovers.push({ location: station[1], duration: PARSER_CONFIG.NOT_AVAILABLE });
      continue;
    }

    const minutes = tryParseDuration(duration);
    if (minutes === null || minutes >= PARSER_CONFIG.LAYOVER_MIN_MINUTES) {
      layovers.push({ location: station[1], duration });
    }
  }

  return layovers;
}

function parsePerDiem(block: string): { perDiem?: number | string; correctedPerDiem: number } {
  const match = block.match(PERDIEM_RE);
  if (!match) return { correctedPerDiem: 0 };

  const cleaned = match[1].replace(/,/g, '');
  const amount = cleaned === '' ? NaN : Number(cleaned);
  if (isNaN(amount)) {
    return { perDiem: match[1].trim(), correctedPerDiem: 0 };
  }
  return { perDiem: amount, correctedPerDiem: Math.ceil(amount / 2) };
}

function parseCredit(block: string): {
  creditTime?: string;
  creditMinutes?: number;
  correctedCredit: number;
} {
  const match = block.match(CREDIT_RE);
  if (!match) return { correctedCredit: 0 };

  const creditTime = match[1].trim();
  const creditMinutes = tryParseDuration(creditTime);
  if (creditMinutes === null) return { creditTime, correctedCredit: 0 };

  return { creditTime, creditMinutes, correctedCredit: roundTo2(creditMinutes / 60) };
}

function parseTafb(block: string): { tafb?: string; tafbMinutes?: number } {
  const match = block.match(TAFB_RE);
  if (!match) return {};

  const tafb = match[1].trim();
  const tafbMinutes = tryParseDuration(tafb);
  return tafbMinutes === null ? { tafb } : { tafb, tafbMinutes };
}

/**
 * Build a Trip from one final-style block, or null when the block has no header
 */
export function parseTripBlock(block: string, options: ExtractionOptions): Trip | null {
  const header = parseTripHeader(block);
  if (!header) return null;

  const effectiveYear = determineEffectiveYear(block, options.referenceDate);
  const operatingDates = parseOperatingDates(block, effectiveYear);

  const tafb = parseTafb(block);
  const credit = parseCredit(block);
  const perDiem = parsePerDiem(block);

  const { days, legs } = extractLegs(block);
  const deadheadLegs = legs
    .filter(leg => leg.isDeadhead)
    .map(formatDeadheadLeg);
  const layovers = extractLayovers(block);

  const derived = deriveTripAttributes({
    block,
    days,
    layovers,
    operatingDates,
    creditMinutes: credit.creditMinutes,
  });

  return {
    ...header,
    originalText: block,
    effectiveYear,
    operatingDates,
    ...tafb,
    ...credit,
    ...perDiem,
    days,
    layovers,
    hasDeadhead: deadheadLegs.length > 0,
    deadheadLegs,
    ...deadheadEdges(days),
    ...derived,
  };
}
