import { createHash } from 'crypto';
import { customAlphabet } from 'nanoid';
import type { Trip } from '../shared/schema';
import { PARSER_CONFIG, type PrelimIdStrategy } from './config';
import { parseTripBlock, parseTripHeader, type ExtractionOptions } from './tripExtractor';

/**
 * Produces the pairing identifier for a prelim block that has none
 */
export type PrelimIdGenerator = (block: string) => string;

export interface PrelimOptions extends ExtractionOptions {
  generateId: PrelimIdGenerator;
}

// Same block always maps to the same identifier
export const fingerprintPrelimId: PrelimIdGenerator = block => {
  const digest = createHash('sha1').update(block).digest();
  const value = digest.readUInt32BE(0) % 1_000_000;
  return `P${String(value).padStart(6, '0')}`;
};

export function createSequentialPrelimIds(start = 1): PrelimIdGenerator {
  let next = start;
  return () => `P${String(next++).padStart(6, '0')}`;
}

export function createRandomPrelimIds(): PrelimIdGenerator {
  const digits = customAlphabet('0123456789', 6);
  return () => `P${digits()}`;
}

export function createPrelimIdGenerator(strategy: PrelimIdStrategy): PrelimIdGenerator {
  switch (strategy) {
    case 'sequence':
      return createSequentialPrelimIds();
    case 'random':
      return createRandomPrelimIds();
    case 'fingerprint':
      return fingerprintPrelimId;
  }
}

interface PrelimHead {
  base: string;
  mask: string;
  effectiveClause: string;
}

function readPrelimHead(head: string): PrelimHead {
  let base: string = PARSER_CONFIG.UNKNOWN_BASE;
  let mask: string = PARSER_CONFIG.EMPTY_MASK;

  // "YEG: 111____"
  const baseMask = head.match(/\b([A-Z]{3}):\s*([0-9_]{1,7})/);
  if (baseMask) {
    base = baseMask[1].toUpperCase();
    mask = baseMask[2];
  } else {
    const city = head.match(/^\s*([A-Z]{3})\b/);
    if (city) base = city[1].toUpperCase();
  }

  const effective = head.match(/(effective.*)$/i);
  return { base, mask, effectiveClause: effective ? effective[1] : 'effective AUTO' };
}

/**
 * Rewrite a headerless prelim block into a final-style block and extract it.
 * A block that already carries a real "TRIP #" is extracted as written: it
 * keeps its identifiers and header base and is not tagged as preliminary.
 */
export function adaptPrelimBlock(block: string, options: PrelimOptions): Trip | null {
  const lines = block
    .trim()
    .split(/\r?\n/)
    .filter(line => line.trim());
  if (lines.length === 0) return null;

  const { base, mask, effectiveClause } = readPrelimHead(lines[0]);

  if (parseTripHeader(block)) {
    const trip = parseTripBlock(block, options);
    // Header without a base code: fall back to the head's "<BASE>:" or city code
    if (!trip || trip.base !== null || base === PARSER_CONFIG.UNKNOWN_BASE) return trip;
    return { ...trip, base };
  }

  const pairingNumber = options.generateId(block);
  const syntheticHeader = `TRIP #${base}  ${pairingNumber}  (${base}) ${base}: ${mask} ${effectiveClause}`;
  const trip = parseTripBlock(`${syntheticHeader}\n${block}`, options);
  return trip ? { ...trip, isPrelim: true } : null;
}
