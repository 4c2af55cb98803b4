import { read, utils, writeFile, WorkBook } from 'xlsx';
import { ProductionRow } from '@/types';
import { computeRowMetrics } from './kpi';

const SHEET_NAME = 'KPI Report';

const normalizeKey = (key: string) => key.toLowerCase().replace(/[^a-z0-9]/g, '');

// Normalized header -> row field
const HEADER_ALIASES: Record<string, keyof ProductionRow> = {
    line: 'line',
    shift: 'shift',
    units: 'units',
    unitsproduced: 'units',
    actual: 'units',
    target: 'target',
    scrap: 'scrapPct',
    scrappct: 'scrapPct',
    scrappercent: 'scrapPct',
    downtime: 'downtimeHours',
    downtimeh: 'downtimeHours',
    downtimehr: 'downtimeHours',
    downtimehours: 'downtimeHours',
};

const toNumber = (value: unknown): number => {
    if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
    if (typeof value !== 'string') return 0;
    const parsed = Number(value.replace(/[%,\s]/g, ''));
    return Number.isFinite(parsed) ? parsed : 0;
};

const toText = (value: unknown): string =>
    value === undefined || value === null ? '' : String(value).trim();

const toProductionRow = (raw: Record<string, unknown>): ProductionRow => {
    const row: ProductionRow = { line: '', shift: '', units: 0, target: 0, scrapPct: 0, downtimeHours: 0 };

    for (const [key, value] of Object.entries(raw)) {
        const field = HEADER_ALIASES[normalizeKey(key)];
        if (!field) continue;

        if (field === 'line' || field === 'shift') {
            row[field] = toText(value);
        } else {
            row[field] = toNumber(value);
        }
    }

    return row;
};

// XLSX (zip) and legacy XLS (compound file) signatures
const BINARY_SIGNATURES = [
    [0x50, 0x4b, 0x03, 0x04],
    [0xd0, 0xcf, 0x11, 0xe0],
];

/** UTF-8 text for CSV uploads, null for binary workbooks. */
const decodeIfText = (bytes: Uint8Array): string | null => {
    const isBinary = BINARY_SIGNATURES.some(signature => signature.every((byte, i) => bytes[i] === byte));
    return isBinary ? null : new TextDecoder('utf-8').decode(bytes);
};

/**
 * Read production rows from the first sheet of an uploaded CSV/XLSX file.
 * Rows without a line name are dropped.
 */
export const parseProductionSheet = (data: ArrayBuffer | string): ProductionRow[] => {
    const text = typeof data === 'string' ? data : decodeIfText(new Uint8Array(data));
    const workbook = text !== null
        ? read(text, { type: 'string', raw: true })
        : read(new Uint8Array(data), { type: 'array', raw: true });

    const firstSheetName = workbook.SheetNames[0];
    if (!firstSheetName) return [];

    const rawRows = utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[firstSheetName], { defval: '' });
    return rawRows.map(toProductionRow).filter(row => row.line.length > 0);
};

export const buildProductionWorkbook = (rows: readonly ProductionRow[]): WorkBook => {
    const table = rows.map(computeRowMetrics).map(row => ({
        'line': row.line,
        'shift': row.shift,
        'units': row.units,
        'target': row.target,
        'variance': row.variance,
        'attainment %': Math.round(row.attainment * 1000) / 10,
        'scrap %': row.scrapPct,
        'downtime (h)': row.downtimeHours,
    }));

    const workbook = utils.book_new();
    utils.book_append_sheet(workbook, utils.json_to_sheet(table), SHEET_NAME);
    return workbook;
};

/** Triggers a browser download of the report. */
export const exportProductionRows = (rows: readonly ProductionRow[], fileName = 'kpi-report.xlsx') => {
    writeFile(buildProductionWorkbook(rows), fileName);
};
