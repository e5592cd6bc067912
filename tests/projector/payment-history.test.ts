import { describe, it, expect } from 'vitest';
import { parsePaymentHistory } from '@bureau-insights/report-parser';

describe('parsePaymentHistory', () => {
  it('should split entries into dated status codes in order', () => {
    expect(parsePaymentHistory('01-2020,XXX/01|02-2020,091/02')).toEqual([
      { date: '01-2020', status_code: 'XXX/01' },
      { date: '02-2020', status_code: '091/02' },
    ]);
  });

  it('should return an empty list for empty or missing history', () => {
    expect(parsePaymentHistory('')).toEqual([]);
    expect(parsePaymentHistory(null)).toEqual([]);
    expect(parsePaymentHistory(undefined)).toEqual([]);
  });

  it('should drop entries without exactly two fields', () => {
    expect(parsePaymentHistory('bad-entry|01-2020,XXX/01')).toEqual([{ date: '01-2020', status_code: 'XXX/01' }]);
    expect(parsePaymentHistory('01-2020,XXX/01,extra|02-2020,000/STD')).toEqual([
      { date: '02-2020', status_code: '000/STD' },
    ]);
  });

  it('should skip blank entries', () => {
    expect(parsePaymentHistory('|01-2020,STD/01|  |')).toEqual([{ date: '01-2020', status_code: 'STD/01' }]);
  });

  it('should keep duplicates and keep status codes verbatim', () => {
    expect(parsePaymentHistory('01-2020,abc|01-2020,abc')).toEqual([
      { date: '01-2020', status_code: 'abc' },
      { date: '01-2020', status_code: 'abc' },
    ]);
  });
});
