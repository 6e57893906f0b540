import { containsLegLine } from './tripExtractor';

const FINAL_SPLIT = /(?=\bTRIP\s*#)/i;
// A line opening with an identifier and carrying "effective MON DD" starts a prelim
const PRELIM_SPLIT = /(?=^[ \t]*[A-Z]{3,}.*?effective\s+[A-Z]{3}\s+\d{1,2})/im;

export interface FinalSplit {
  finals: string[];
  remainder: string[];
}

/**
 * Drop the cover page / disclaimer text ahead of the first pairing.
 * The cut is made at the start of the line holding the first anchor.
 */
export function stripCoverPages(text: string): string {
  const lower = text.toLowerCase();
  const anchors = [lower.indexOf('trip #'), lower.indexOf('effective ')].filter(
    index => index !== -1
  );
  if (anchors.length === 0) return text;

  const firstAnchor = Math.min(...anchors);
  const lineStart = text.lastIndexOf('\n', firstAnchor - 1) + 1;
  return lineStart > 0 ? text.substring(lineStart) : text;
}

export function isFinalCandidate(piece: string): boolean {
  return (
    piece.includes('TRIP') &&
    (piece.includes('TAFB') || piece.includes('Credit Time:') || piece.includes('PERDIEM:'))
  );
}

export function isPrelimCandidate(piece: string): boolean {
  return (
    piece.toLowerCase().includes('effective') &&
    (piece.includes('TAFB') || piece.includes('Credit Time:') || containsLegLine(piece))
  );
}

/**
 * Split at every "TRIP #" header, keeping the header at the start of each piece
 */
export function splitFinalBlocks(text: string): FinalSplit {
  const finals: string[] = [];
  const remainder: string[] = [];

  for (const piece of text.split(FINAL_SPLIT)) {
    if (isFinalCandidate(piece)) {
      finals.push(piece);
    } else {
      remainder.push(piece);
    }
  }

  return { finals, remainder };
}

/**
 * Split a fragment that may hold several prelim pairings and keep the qualifying pieces
 */
export function splitPrelimBlocks(text: string): string[] {
  return text.split(PRELIM_SPLIT).filter(isPrelimCandidate);
}
