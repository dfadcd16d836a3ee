import { describe, it, expect } from 'vitest';
import { isIsoDate, latestDate, pointsAfter, orderSeries } from '../../src/domain/series';
import type { Series } from '../../src/domain/series';

describe('series helpers', () => {
  describe('isIsoDate', () => {
    it('accepts real calendar days', () => {
      expect(isIsoDate('2024-02-29')).toBe(true);
      expect(isIsoDate('2012-01-01')).toBe(true);
    });

    it('rejects impossible days and other formats', () => {
      expect(isIsoDate('2023-02-29')).toBe(false);
      expect(isIsoDate('2024-13-01')).toBe(false);
      expect(isIsoDate('2024-3-1')).toBe(false);
      expect(isIsoDate('2024-03-01T00:00:00Z')).toBe(false);
      expect(isIsoDate('Date')).toBe(false);
      expect(isIsoDate('')).toBe(false);
    });
  });

  describe('latestDate', () => {
    it('returns the last date', () => {
      expect(
        latestDate([
          { date: '2024-03-10', value: 1 },
          { date: '2024-03-11', value: 2 },
        ])
      ).toBe('2024-03-11');
    });

    it('returns null for an empty series', () => {
      expect(latestDate([])).toBeNull();
    });
  });

  describe('pointsAfter', () => {
    const series: Series = [
      { date: '2024-03-09', value: 0.9 },
      { date: '2024-03-10', value: 1.0 },
      { date: '2024-03-11', value: 1.1 },
      { date: '2024-03-12', value: 1.2 },
    ];

    it('selects points strictly newer than the mark, in order', () => {
      expect(pointsAfter(series, '2024-03-10')).toEqual([
        { date: '2024-03-11', value: 1.1 },
        { date: '2024-03-12', value: 1.2 },
      ]);
    });

    it('selects nothing when the mark is the latest date', () => {
      expect(pointsAfter(series, '2024-03-12')).toEqual([]);
    });

    it('selects everything for a null mark', () => {
      expect(pointsAfter(series, null)).toEqual(series);
    });
  });

  describe('orderSeries', () => {
    it('leaves an ascending unique series untouched', () => {
      const input: Series = [
        { date: '2024-01-01', value: 1 },
        { date: '2024-01-02', value: 2 },
      ];

      const result = orderSeries(input);

      expect(result.series).toEqual(input);
      expect(result.reordered).toBe(false);
      expect(result.duplicatesDropped).toBe(0);
    });

    it('sorts out-of-order points ascending', () => {
      const result = orderSeries([
        { date: '2024-01-03', value: 3 },
        { date: '2024-01-01', value: 1 },
        { date: '2024-01-02', value: 2 },
      ]);

      expect(result.series.map((p) => p.date)).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
      expect(result.reordered).toBe(true);
    });

    it('keeps the last occurrence of a duplicated date', () => {
      const result = orderSeries([
        { date: '2024-01-01', value: 1 },
        { date: '2024-01-02', value: 2 },
        { date: '2024-01-01', value: 9 },
      ]);

      expect(result.series).toEqual([
        { date: '2024-01-01', value: 9 },
        { date: '2024-01-02', value: 2 },
      ]);
      expect(result.duplicatesDropped).toBe(1);
      expect(result.reordered).toBe(true);
    });
  });
});
