import { describe, expect, it } from 'vitest';
import {
    DEFAULT_PRODUCTION_ROWS,
    computeHeadlineKpis,
    computeRowMetrics,
    formatPercent,
    formatSigned,
    formatUnits,
    safeRatio,
} from '../kpi';

describe('safeRatio', () => {
    it('divides normally', () => {
        expect(safeRatio(1, 4)).toBe(0.25);
    });

    it('returns zero for a zero denominator', () => {
        expect(safeRatio(5, 0)).toBe(0);
        expect(safeRatio(5, 1e-12)).toBe(0);
    });
});

describe('computeRowMetrics', () => {
    it('derives variance and attainment', () => {
        const [lineA, lineB] = DEFAULT_PRODUCTION_ROWS.map(computeRowMetrics);

        expect(lineA.variance).toBe(100);
        expect(lineA.attainment).toBeCloseTo(1200 / 1100);
        expect(lineB.variance).toBe(-50);
        expect(formatPercent(lineB.attainment)).toBe('94.7%');
    });

    it('reports zero attainment when there is no target', () => {
        const metrics = computeRowMetrics({ ...DEFAULT_PRODUCTION_ROWS[0], target: 0 });
        expect(metrics.attainment).toBe(0);
        expect(metrics.variance).toBe(1200);
    });
});

describe('computeHeadlineKpis', () => {
    it('totals the seeded lines', () => {
        const kpis = computeHeadlineKpis(DEFAULT_PRODUCTION_ROWS);

        expect(kpis).not.toBeNull();
        expect(kpis).toMatchObject({
            totalUnits: 2850,
            totalTarget: 2850,
            totalVariance: 0,
            averageAttainment: 1,
        });
        expect(kpis?.averageScrapPct).toBeCloseTo(4.6 / 3);
        expect(kpis?.totalDowntimeHours).toBeCloseTo(2.5);
    });

    it('truncates fractional unit totals', () => {
        const kpis = computeHeadlineKpis([{ line: 'L', shift: 'S', units: 10.7, target: 9.9, scrapPct: 0, downtimeHours: 0 }]);
        expect(kpis?.totalUnits).toBe(10);
        expect(kpis?.totalTarget).toBe(9);
        expect(kpis?.totalVariance).toBe(1);
    });

    it('returns null without rows', () => {
        expect(computeHeadlineKpis([])).toBeNull();
    });
});

describe('formatters', () => {
    it('formats percentages', () => {
        expect(formatPercent(1, 0)).toBe('100%');
        expect(formatPercent(0.125, 2)).toBe('12.50%');
    });

    it('adds thousands separators', () => {
        expect(formatUnits(2850)).toBe('2,850');
        expect(formatUnits(950)).toBe('950');
    });

    it('signs positive deltas only', () => {
        expect(formatSigned(100)).toBe('+100');
        expect(formatSigned(-50)).toBe('-50');
        expect(formatSigned(0)).toBe('0');
        expect(formatSigned(-5.263, 1)).toBe('-5.3');
    });
});
