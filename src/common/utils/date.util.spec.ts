import { compactDate, fromSheetDate, isoDate, parseCellDate, toSheetDate } from './date.util';

describe('date utils', () => {
  describe('parseCellDate', () => {
    it('should accept ISO, day-first and compact text', () => {
      expect(parseCellDate('2024-07-01')).toEqual(new Date(2024, 6, 1));
      expect(parseCellDate('01/07/2024')).toEqual(new Date(2024, 6, 1));
      expect(parseCellDate('20240701')).toEqual(new Date(2024, 6, 1));
    });

    it('should pass Date cells through', () => {
      const date = new Date(2024, 6, 1);
      expect(parseCellDate(date)).toBe(date);
    });

    it('should return null for anything else', () => {
      expect(parseCellDate('next week')).toBeNull();
      expect(parseCellDate('')).toBeNull();
      expect(parseCellDate(45474)).toBeNull();
      expect(parseCellDate(null)).toBeNull();
      expect(parseCellDate('2024-13-45')).toBeNull();
    });
  });

  it('should convert between sheet dates and local calendar days', () => {
    const local = new Date(2024, 1, 29);

    expect(toSheetDate(local)).toEqual(new Date(Date.UTC(2024, 1, 29)));
    expect(fromSheetDate(toSheetDate(local))).toEqual(local);
  });

  it('should format compact and ISO stamps', () => {
    expect(compactDate(new Date(2024, 6, 1))).toBe('20240701');
    expect(isoDate(new Date(2024, 6, 1))).toBe('2024-07-01');
  });
});
