/**
 * Small hand-written pairing documents shared by the parser tests
 */

export const FINAL_PAIRING = [
  'TRIP #1234 5678 (YYC) effective JUL 05-JUL 26 [1,1,1,1,1,0,0]',
  '    RPT 11:30',
  '    1 AC123 YYC YVR 08:00 10:00 2h00',
  '    RLS 13:30',
  'TAFB: 25h30 Credit Time: 18h45 PERDIEM: 120.00',
  '',
].join('\n');

export const PRELIM_PAIRING = [
  'YEG: 111____ effective SEP 01-SEP 30',
  '    1 4410 YEG YYZ 07:00 12:30 3h30',
  '---- YYZ Hotel 17h30',
  '    2 4411 YYZ YEG 14:00 16:10 4h10',
  'Credit Time: 9h00',
  '',
].join('\n');

export const COVER_PAGE = [
  'CREW SCHEDULING SYSTEM',
  'Pairing report for internal use only',
  '',
].join('\n');

// Prelim first: a final block runs to the next "TRIP #" and would absorb it
export const MIXED_DOCUMENT = COVER_PAGE + PRELIM_PAIRING + FINAL_PAIRING;

export const REDEYE_PAIRING = [
  'TRIP #900 R900 (YVR)',
  '    1 101 YVR YYZ 21:00 23:50 4h50',
  '---- YYZ Hotel 20h00',
  '    2 102 YYZ YVR 01:50 02:10 5h20',
  'TAFB: 30h00',
  '',
].join('\n');
