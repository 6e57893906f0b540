import { addDays, format, parseISO } from 'date-fns';
import type { Layover, Leg } from '../shared/schema';
import { PARSER_CONFIG } from './config';
import { timeOfDayToMinutes, tryParseDuration } from './durationCodec';
import { weekdayIndex } from './operatingCalendar';

export type TripDays = Record<string, Leg[]>;

export interface DerivedAttributes {
  longestLayover: number;
  daysOfWork: number;
  creditTimePerDay: number;
  calendar: Record<string, string>[];
  isRedeye: boolean;
  isLazyPairing: boolean;
  isWeekdayOnly: boolean;
  isCommutable: boolean;
  reportTime?: string;
  releaseTime?: string;
}

export interface DerivationInput {
  block: string;
  days: TripDays;
  layovers: Layover[];
  operatingDates: string[];
  creditMinutes?: number;
}

const CALENDAR_FORMAT = 'EEE dd MMM';

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function sortedDayNumbers(days: TripDays): number[] {
  return Object.keys(days)
    .map(key => parseInt(key, 10))
    .filter(day => !isNaN(day))
    .sort((a, b) => a - b);
}

/**
 * Longest layover in hours; layovers without a readable duration are ignored
 */
export function calculateLongestLayover(layovers: Layover[]): number {
  const longest = layovers.reduce((max, layover) => {
    const minutes = tryParseDuration(layover.duration);
    return minutes !== null && minutes > max ? minutes : max;
  }, 0);
  return longest > 0 ? roundTo2(longest / 60) : 0;
}

export function calculateDaysOfWork(days: TripDays): number {
  const dayNumbers = sortedDayNumbers(days);
  return dayNumbers.length > 0 ? dayNumbers[dayNumbers.length - 1] : 0;
}

export function calculateCreditPerDay(creditMinutes: number | undefined, daysOfWork: number): number {
  if (creditMinutes === undefined || daysOfWork <= 0) return 0;
  return roundTo2(creditMinutes / daysOfWork / 60);
}

/**
 * One entry per operating date: day-of-trip -> calendar date of that duty day
 */
export function buildTripCalendar(operatingDates: string[], days: TripDays): Record<string, string>[] {
  const dayNumbers = sortedDayNumbers(days);
  if (dayNumbers.length === 0) return [];

  return operatingDates.map(startDate => {
    const start = parseISO(startDate);
    const instance: Record<string, string> = {};
    for (const day of dayNumbers) {
      instance[String(day)] = format(addDays(start, day - 1), CALENDAR_FORMAT);
    }
    return instance;
  });
}

/**
 * Whether a leg's local time window contains the redeye instant (02:00)
 */
export function legSpansRedeyeInstant(leg: Leg): boolean {
  const departure = timeOfDayToMinutes(leg.depTime);
  const arrival = timeOfDayToMinutes(leg.arrTime);
  if (departure === null || arrival === null) return false;

  const instant = PARSER_CONFIG.REDEYE_INSTANT_MINUTES;
  if (departure <= arrival) {
    return departure <= instant && instant <= arrival;
  }
  // Crosses midnight
  return arrival >= instant || departure <= instant;
}

export function isRedeyePairing(daysOfWork: number, layovers: Layover[], days: TripDays): boolean {
  if (daysOfWork <= 1 || layovers.length === 0) return false;
  return Object.values(days).some(legs => legs.some(legSpansRedeyeInstant));
}

export function isLazyPairing(daysOfWork: number, days: TripDays): boolean {
  return daysOfWork > 1 && Object.values(days).every(legs => legs.length <= 1);
}

/**
 * True when every duty day of every operating instance falls Monday-Friday
 */
export function isWeekdayOnlyPairing(operatingDates: string[], days: TripDays): boolean {
  const dayNumbers = sortedDayNumbers(days);
  if (operatingDates.length === 0 || dayNumbers.length === 0) return false;

  return operatingDates.every(startDate => {
    const start = parseISO(startDate);
    return dayNumbers.every(day => weekdayIndex(addDays(start, day - 1)) < 5);
  });
}

export function findReportAndRelease(block: string): { reportTime?: string; releaseTime?: string } {
  const report = block.match(/RPT.*?(\d{2}:\d{2})/);
  const release = block.match(/RLS.*?(\d{2}:\d{2})/);
  return {
    reportTime: report ? report[1] : undefined,
    releaseTime: release ? release[1] : undefined,
  };
}

export function isCommutablePairing(
  daysOfWork: number,
  reportTime: string | undefined,
  releaseTime: string | undefined
): boolean {
  const { DAYS_OF_WORK, REPORT_AFTER_MINUTES, RELEASE_BEFORE_MINUTES } = PARSER_CONFIG.COMMUTE;
  if (!DAYS_OF_WORK.some(days => days === daysOfWork)) return false;

  const report = reportTime ? timeOfDayToMinutes(reportTime) : null;
  const release = releaseTime ? timeOfDayToMinutes(releaseTime) : null;
  if (report === null || release === null) return false;

  return report > REPORT_AFTER_MINUTES && release < RELEASE_BEFORE_MINUTES;
}

/**
 * Compute every secondary classification from the extracted structure
 */
export function deriveTripAttributes(input: DerivationInput): DerivedAttributes {
  const { block, days, layovers, operatingDates, creditMinutes } = input;

  const daysOfWork = calculateDaysOfWork(days);
  const { reportTime, releaseTime } = findReportAndRelease(block);

  return {
    longestLayover: calculateLongestLayover(layovers),
    daysOfWork,
    creditTimePerDay: calculateCreditPerDay(creditMinutes, daysOfWork),
    calendar: buildTripCalendar(operatingDates, days),
    isRedeye: isRedeyePairing(daysOfWork, layovers, days),
    isLazyPairing: isLazyPairing(daysOfWork, days),
    isWeekdayOnly: isWeekdayOnlyPairing(operatingDates, days),
    isCommutable: isCommutablePairing(daysOfWork, reportTime, releaseTime),
    reportTime,
    releaseTime,
  };
}
