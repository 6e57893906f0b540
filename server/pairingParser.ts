import type { Trip } from '../shared/schema';
import {
  splitFinalBlocks,
  splitPrelimBlocks,
  stripCoverPages,
} from './blockSegmenter';
import type { PrelimIdStrategy } from './config';
import { decodeDocument } from './documentText';
import { logger } from './logger';
import {
  adaptPrelimBlock,
  createPrelimIdGenerator,
  fingerprintPrelimId,
  type PrelimIdGenerator,
} from './prelimAdapter';
import { parseTripBlock } from './tripExtractor';

export interface ParseOptions {
  /** Date the effective year is resolved against; defaults to now */
  referenceDate?: Date;
  generateId?: PrelimIdGenerator;
}

function tripKey(trip: Trip): string {
  return `${trip.tripNumber}\u0000${trip.pairingNumber}`;
}

// A block that throws is reported and skipped so its siblings still parse
function extractSafely(kind: 'final' | 'prelim', index: number, extract: () => Trip | null): Trip | null {
  try {
    return extract();
  } catch (error) {
    logger(
      'error',
      `Failed to parse ${kind} block #${index + 1}: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
}

/**
 * Extract every pairing in a document: final blocks first, then prelim
 * blocks whose (trip, pairing) identifiers were not already seen
 */
export function parseDocument(text: string, options: ParseOptions = {}): Trip[] {
  const referenceDate = options.referenceDate ?? new Date();
  const generateId = options.generateId ?? fingerprintPrelimId;

  const content = stripCoverPages(text);
  const { finals, remainder } = splitFinalBlocks(content);

  const parsed: Trip[] = [];
  const seen = new Set<string>();

  finals.forEach((block, index) => {
    const trip = extractSafely('final', index, () => parseTripBlock(block, { referenceDate }));
    if (trip) {
      parsed.push(trip);
      seen.add(tripKey(trip));
    }
  });

  const prelimBlocks = remainder.flatMap(splitPrelimBlocks);
  prelimBlocks.forEach((block, index) => {
    const trip = extractSafely('prelim', index, () =>
      adaptPrelimBlock(block, { referenceDate, generateId })
    );
    if (!trip) return;

    const key = tripKey(trip);
    if (seen.has(key)) {
      logger('debug', `Skipping duplicate prelim pairing ${trip.tripNumber}/${trip.pairingNumber}`);
      return;
    }
    parsed.push(trip);
    seen.add(key);
  });

  return parsed;
}

export interface PairingParserSettings {
  prelimIdStrategy?: PrelimIdStrategy;
}

export class PairingParser {
  constructor(private readonly settings: PairingParserSettings = {}) {}

  parse(text: string, referenceDate?: Date): Trip[] {
    logger('debug', `Parsing document: ${text.length} characters`);

    // Fresh generator per document so sequential ids restart at P000001
    const generateId = createPrelimIdGenerator(this.settings.prelimIdStrategy ?? 'fingerprint');
    const trips = parseDocument(text, { referenceDate, generateId });

    const prelims = trips.filter(trip => trip.isPrelim).length;
    logger('info', `Parsed ${trips.length} pairings (${trips.length - prelims} final, ${prelims} prelim)`);
    return trips;
  }

  parseBuffer(buffer: Buffer | Uint8Array, referenceDate?: Date): Trip[] {
    return this.parse(decodeDocument(buffer), referenceDate);
  }
}
