import { IsoDate, formatCalendarDate, formatDateTime, parseIsoCalendarDate } from '../dateUtils.js';

describe('dateUtils', () => {
  describe('IsoDate', () => {
    it('parses and renders an ISO calendar date', () => {
      expect(new IsoDate('1992-07-30').toString()).toBe('1992-07-30');
    });

    it('takes the local calendar day of a Date', () => {
      expect(new IsoDate(new Date(2016, 6, 30, 23, 59)).toString()).toBe('2016-07-30');
    });

    it('defaults to today', () => {
      const today = new Date();
      const expected = formatCalendarDate(today, 'YYYY-MM-DD');

      expect(new IsoDate().toString()).toBe(expected);
    });

    it('compares by calendar day', () => {
      const date = new IsoDate('2016-07-30');

      expect(new IsoDate('2016-07-31').isAfter(date)).toBe(true);
      expect(new IsoDate('2016-07-30').isAfter(date)).toBe(false);
      expect(new IsoDate('2015-12-31').isAfter(date)).toBe(false);
    });

    it('converts to local midnight', () => {
      expect(new IsoDate('2016-07-30').toDate()).toEqual(new Date(2016, 6, 30));
    });
  });

  describe('parseIsoCalendarDate', () => {
    it('rejects text that is not a calendar date', () => {
      expect(() => parseIsoCalendarDate('30-07-1992')).toThrow('Invalid ISO calendar date: 30-07-1992');
    });

    it('rejects a day that does not exist', () => {
      expect(() => parseIsoCalendarDate('2021-02-29')).toThrow('No such day');
    });
  });

  describe('formatCalendarDate', () => {
    it('formats year, month and day tokens', () => {
      const date = new Date(2024, 2, 5);

      expect(formatCalendarDate(date, 'YYYY-MM-dd')).toBe('2024-03-05');
      expect(formatCalendarDate(date, 'dd/MM/yyyy')).toBe('05/03/2024');
    });
  });

  describe('formatDateTime', () => {
    it('formats date and time in local time', () => {
      expect(formatDateTime(new Date(1999, 11, 31, 23, 5, 9))).toBe('1999-12-31 23:05:09');
    });
  });
});
