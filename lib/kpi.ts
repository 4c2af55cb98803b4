import { HeadlineKpis, ProductionRow, ProductionRowMetrics } from '@/types';

const ZERO_TOLERANCE = 1e-9;

const unitsFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export const DEFAULT_PRODUCTION_ROWS: ProductionRow[] = [
    { line: 'Line A', shift: 'Morning', units: 1200, target: 1100, scrapPct: 1.4, downtimeHours: 0.5 },
    { line: 'Line B', shift: 'Evening', units: 900, target: 950, scrapPct: 2.1, downtimeHours: 1.2 },
    { line: 'Line C', shift: 'Night', units: 750, target: 800, scrapPct: 1.1, downtimeHours: 0.8 },
];

export const EMPTY_PRODUCTION_ROW: ProductionRow = {
    line: '',
    shift: '',
    units: 0,
    target: 0,
    scrapPct: 0,
    downtimeHours: 0,
};

/** Division that yields 0 instead of Infinity/NaN for a (near-)zero denominator. */
export const safeRatio = (numerator: number, denominator: number): number => {
    if (Math.abs(denominator) <= ZERO_TOLERANCE) return 0;
    return numerator / denominator;
};

export const computeRowMetrics = (row: ProductionRow): ProductionRowMetrics => ({
    ...row,
    variance: row.units - row.target,
    attainment: safeRatio(row.units, row.target),
});

/**
 * Plant-wide totals across every line/shift row.
 * Returns null when there are no rows to report on.
 */
export const computeHeadlineKpis = (rows: readonly ProductionRow[]): HeadlineKpis | null => {
    if (rows.length === 0) return null;

    const totalUnits = Math.trunc(rows.reduce((sum, row) => sum + row.units, 0));
    const totalTarget = Math.trunc(rows.reduce((sum, row) => sum + row.target, 0));
    const scrapSum = rows.reduce((sum, row) => sum + row.scrapPct, 0);

    return {
        totalUnits,
        totalTarget,
        totalVariance: totalUnits - totalTarget,
        averageAttainment: safeRatio(totalUnits, totalTarget),
        averageScrapPct: scrapSum / rows.length,
        totalDowntimeHours: rows.reduce((sum, row) => sum + row.downtimeHours, 0),
    };
};

export const formatPercent = (ratio: number, digits = 1): string =>
    `${(ratio * 100).toFixed(digits)}%`;

export const formatUnits = (value: number): string => unitsFormatter.format(value);

export const formatSigned = (value: number, digits = 0): string => {
    const text = value.toFixed(digits);
    return value > 0 ? `+${text}` : text;
};
