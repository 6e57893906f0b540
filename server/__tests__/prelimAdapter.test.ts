/**
 * Prelim adapter tests
 */

import {
  adaptPrelimBlock,
  createPrelimIdGenerator,
  createRandomPrelimIds,
  createSequentialPrelimIds,
  fingerprintPrelimId,
} from '../prelimAdapter';
import { PRELIM_PAIRING } from './helpers/fixtures';

const referenceDate = new Date(2025, 7, 15);

describe('Prelim adapter', () => {
  describe('identifier strategies', () => {
    it('should number prelims sequentially', () => {
      const next = createSequentialPrelimIds();
      expect([next('a'), next('b'), next('c')]).toEqual(['P000001', 'P000002', 'P000003']);
      expect(createSequentialPrelimIds(41)('a')).toBe('P000041');
    });

    it('should derive the same fingerprint for the same block', () => {
      const id = fingerprintPrelimId(PRELIM_PAIRING);
      expect(id).toMatch(/^P\d{6}$/);
      expect(fingerprintPrelimId(PRELIM_PAIRING)).toBe(id);
    });

    it('should draw random six-digit ids', () => {
      expect(createRandomPrelimIds()('a')).toMatch(/^P\d{6}$/);
    });

    it('should build a fresh generator per strategy request', () => {
      expect(createPrelimIdGenerator('sequence')('a')).toBe('P000001');
      expect(createPrelimIdGenerator('sequence')('a')).toBe('P000001');
      expect(createPrelimIdGenerator('fingerprint')).toBe(fingerprintPrelimId);
    });
  });

  describe('adaptPrelimBlock', () => {
    it('should fabricate a header and extract a headerless prelim', () => {
      const trip = adaptPrelimBlock(PRELIM_PAIRING, {
        referenceDate,
        generateId: createSequentialPrelimIds(),
      });

      expect(trip).toMatchObject({
        tripNumber: 'YEG',
        pairingNumber: 'P000001',
        base: 'YEG',
        isPrelim: true,
        effectiveYear: 2025,
        creditTime: '9h00',
        creditMinutes: 540,
        correctedCredit: 9,
        creditTimePerDay: 4.5,
        correctedPerDiem: 0,
        daysOfWork: 2,
        layovers: [{ location: 'YYZ', duration: '17h30' }],
        longestLayover: 17.5,
        hasDeadhead: false,
        deadheadLegs: [],
        isRedeye: false,
        isLazyPairing: true,
        isWeekdayOnly: true,
        isCommutable: false,
      });
      expect(trip?.operatingDates).toEqual([
        '2025-09-01',
        '2025-09-02',
        '2025-09-03',
        '2025-09-08',
        '2025-09-09',
        '2025-09-10',
        '2025-09-15',
        '2025-09-16',
        '2025-09-17',
        '2025-09-22',
        '2025-09-23',
        '2025-09-24',
        '2025-09-29',
        '2025-09-30',
      ]);
      expect(trip?.calendar[0]).toEqual({ '1': 'Mon 01 Sep', '2': 'Tue 02 Sep' });
      expect(trip?.originalText).toBe(
        `TRIP #YEG  P000001  (YEG) YEG: 111____ effective SEP 01-SEP 30\n${PRELIM_PAIRING}`
      );
    });

    it('should keep the identifiers of a block that has a real header', () => {
      const generateId = jest.fn(() => 'P123456');
      const block = 'YUL: 11111__ effective OCT 06-OCT 10\nTRIP #88 4400 (YUL)\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId });

      expect(generateId).not.toHaveBeenCalled();
      expect(trip?.tripNumber).toBe('88');
      expect(trip?.pairingNumber).toBe('4400');
      expect(trip?.base).toBe('YUL');
      expect(trip?.isPrelim).toBeUndefined();
    });

    it('should keep the header base when the block opens with its TRIP line', () => {
      const generateId = jest.fn(() => 'P123456');
      const block = 'TRIP #88 4400 (YUL) effective OCT 06-OCT 10\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId });

      expect(generateId).not.toHaveBeenCalled();
      expect(trip).toMatchObject({ tripNumber: '88', pairingNumber: '4400', base: 'YUL' });
      expect(trip?.originalText).toBe(block);
      expect(trip?.operatingDates).toHaveLength(5);
    });

    it('should borrow the head base when the TRIP line names none', () => {
      const block = 'YUL: 11111__ effective OCT 06-OCT 10\nTRIP #88 4400\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId: () => 'P123456' });

      expect(trip?.base).toBe('YUL');
      expect(trip?.isPrelim).toBeUndefined();
    });

    it('should not read a city code out of a longer word', () => {
      const block = 'ABCD effective OCT 06-OCT 10\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId: () => 'P000777' });

      expect(trip?.tripNumber).toBe('XX');
      expect(trip?.base).toBeNull();
    });

    it('should fall back to a leading city code and every weekday', () => {
      const block = 'ZZZ effective OCT 06-OCT 10\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId: () => 'P000777' });

      expect(trip?.tripNumber).toBe('ZZZ');
      expect(trip?.pairingNumber).toBe('P000777');
      expect(trip?.base).toBe('ZZZ');
      expect(trip?.operatingDates).toEqual([
        '2025-10-06',
        '2025-10-07',
        '2025-10-08',
        '2025-10-09',
        '2025-10-10',
      ]);
    });

    it('should use the unknown-base placeholder as trip number', () => {
      const block = 'effective OCT 06-OCT 10\n    1 4450 YUL YYZ 08:00 09:30 1h30\n';

      const trip = adaptPrelimBlock(block, { referenceDate, generateId: () => 'P000777' });

      expect(trip?.tripNumber).toBe('XX');
      expect(trip?.base).toBeNull();
      expect(trip?.isPrelim).toBe(true);
    });

    it('should return null for a blank block', () => {
      expect(adaptPrelimBlock('  \n\n', { referenceDate, generateId: () => 'P000001' })).toBeNull();
    });
  });
});
