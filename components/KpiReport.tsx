'use client';

import { ChangeEvent, useState } from 'react';
import clsx from 'clsx';
import { Download, Plus, Trash2, UploadCloud } from 'lucide-react';
import { ProductionRow } from '@/types';
import {
    DEFAULT_PRODUCTION_ROWS,
    EMPTY_PRODUCTION_ROW,
    computeHeadlineKpis,
    computeRowMetrics,
    formatPercent,
    formatSigned,
    formatUnits,
} from '@/lib/kpi';
import { exportProductionRows, parseProductionSheet } from '@/lib/kpiSpreadsheet';
import KpiBarChart from './KpiBarChart';

type TextField = 'line' | 'shift';
type NumericField = 'units' | 'target' | 'scrapPct' | 'downtimeHours';

const COLUMNS: { field: TextField | NumericField; label: string; numeric: boolean; step?: string }[] = [
    { field: 'line', label: 'Line', numeric: false },
    { field: 'shift', label: 'Shift', numeric: false },
    { field: 'units', label: 'Units', numeric: true, step: '1' },
    { field: 'target', label: 'Target', numeric: true, step: '1' },
    { field: 'scrapPct', label: 'Scrap %', numeric: true, step: '0.1' },
    { field: 'downtimeHours', label: 'Downtime (h)', numeric: true, step: '0.1' },
];

const isNumericField = (field: TextField | NumericField): field is NumericField =>
    field !== 'line' && field !== 'shift';

interface KpiReportProps {
    initialRows?: ProductionRow[];
}

export default function KpiReport({ initialRows = DEFAULT_PRODUCTION_ROWS }: KpiReportProps) {
    const [rows, setRows] = useState<ProductionRow[]>(initialRows);
    const [importError, setImportError] = useState<string | null>(null);

    const updateCell = (index: number, field: TextField | NumericField, value: string) => {
        setRows(prev => prev.map((row, i) => {
            if (i !== index) return row;
            if (isNumericField(field)) {
                return { ...row, [field]: parseFloat(value) || 0 };
            }
            return { ...row, [field]: value };
        }));
    };

    const addRow = () => setRows(prev => [...prev, { ...EMPTY_PRODUCTION_ROW }]);
    const removeRow = (index: number) => setRows(prev => prev.filter((_, i) => i !== index));

    const handleImport = async (e: ChangeEvent<HTMLInputElement>) => {
        const file = e.target.files?.[0];
        if (!file) return;

        try {
            const imported = parseProductionSheet(await file.arrayBuffer());
            if (imported.length === 0) {
                setImportError(`No production rows found in ${file.name}.`);
                return;
            }
            setRows(imported);
            setImportError(null);
        } catch (error) {
            console.error('KPI import error:', error);
            setImportError(`Could not read ${file.name}. Upload a CSV or XLSX file.`);
        } finally {
            e.target.value = '';
        }
    };

    const headline = computeHeadlineKpis(rows);
    const metrics = rows.map(computeRowMetrics);

    return (
        <div className="space-y-8">
            <section>
                <div className="flex items-center justify-between mb-2">
                    <h2 className="text-xl font-semibold text-white">Input data</h2>
                    <div className="flex gap-2">
                        <label className="flex items-center gap-1 text-sm px-3 py-1.5 rounded-lg bg-slate-800 hover:bg-slate-700 text-slate-200 cursor-pointer">
                            <UploadCloud className="w-4 h-4" />
                            Import
                            <input
                                type="file"
                                accept=".csv,.xlsx,.xls"
                                aria-label="Import production rows"
                                className="hidden"
                                onChange={(e) => void handleImport(e)}
                            />
                        </label>
                        <button
                            type="button"
                            onClick={() => exportProductionRows(rows)}
                            disabled={rows.length === 0}
                            className="flex items-center gap-1 text-sm px-3 py-1.5 rounded-lg bg-slate-800 hover:bg-slate-700 text-slate-200 disabled:opacity-40"
                        >
                            <Download className="w-4 h-4" />
                            Export
                        </button>
                    </div>
                </div>
                <p className="text-xs text-slate-500 mb-3">Edit any cell to reflect the most recent production run.</p>
                {importError && <p role="alert" className="text-sm text-red-300 mb-3">{importError}</p>}

                <table className="w-full text-sm">
                    <thead className="text-xs uppercase text-slate-500 border-b border-slate-800">
                        <tr>
                            {COLUMNS.map(col => <th key={col.field} className="py-2 pr-2 text-left">{col.label}</th>)}
                            <th className="py-2" />
                        </tr>
                    </thead>
                    <tbody>
                        {rows.map((row, index) => (
                            <tr key={index} className="border-b border-slate-800/60">
                                {COLUMNS.map(col => (
                                    <td key={col.field} className="py-1 pr-2">
                                        <input
                                            type={col.numeric ? 'number' : 'text'}
                                            step={col.step}
                                            aria-label={`${col.label} row ${index + 1}`}
                                            value={row[col.field]}
                                            onChange={(e) => updateCell(index, col.field, e.target.value)}
                                            className="w-full px-2 py-1 bg-slate-950 border border-slate-800 rounded text-slate-100"
                                        />
                                    </td>
                                ))}
                                <td className="py-1">
                                    <button
                                        type="button"
                                        aria-label={`Remove row ${index + 1}`}
                                        onClick={() => removeRow(index)}
                                        className="p-1 text-slate-500 hover:text-red-400"
                                    >
                                        <Trash2 className="w-4 h-4" />
                                    </button>
                                </td>
                            </tr>
                        ))}
                    </tbody>
                </table>
                <button
                    type="button"
                    onClick={addRow}
                    className="mt-3 flex items-center gap-1 text-sm text-cyan-300 hover:text-cyan-200"
                >
                    <Plus className="w-4 h-4" /> Add row
                </button>
            </section>

            {!headline ? (
                <div role="status" className="bg-amber-950/40 border-l-4 border-amber-500 p-4 text-amber-200">
                    Add at least one row to generate the KPI report.
                </div>
            ) : (
                <>
                    <section>
                        <h2 className="text-xl font-semibold text-white mb-3">Headline KPIs</h2>
                        <div className="grid gap-4 md:grid-cols-4">
                            <KpiTile
                                label="Total output"
                                value={`${formatUnits(headline.totalUnits)} units`}
                                delta={formatSigned(headline.totalVariance)}
                                positive={headline.totalVariance >= 0}
                            />
                            <KpiTile
                                label="Target attainment"
                                value={formatPercent(headline.averageAttainment, 0)}
                                delta={formatSigned((headline.averageAttainment - 1) * 100, 1) + '%'}
                                positive={headline.averageAttainment >= 1}
                            />
                            <KpiTile label="Average scrap" value={`${headline.averageScrapPct.toFixed(2)}%`} />
                            <KpiTile label="Downtime" value={`${headline.totalDowntimeHours.toFixed(1)} hrs`} />
                        </div>
                    </section>

                    <section>
                        <h2 className="text-xl font-semibold text-white mb-3">Performance by line</h2>
                        <table className="w-full text-sm text-left">
                            <thead className="text-xs uppercase text-slate-500 border-b border-slate-800">
                                <tr>
                                    <th className="py-2">line</th>
                                    <th className="py-2">shift</th>
                                    <th className="py-2">units</th>
                                    <th className="py-2">target</th>
                                    <th className="py-2">variance</th>
                                    <th className="py-2">attainment %</th>
                                    <th className="py-2">scrap %</th>
                                    <th className="py-2">downtime (h)</th>
                                </tr>
                            </thead>
                            <tbody className="text-slate-200 font-mono">
                                {metrics.map((row, index) => (
                                    <tr key={index} data-testid={`metrics-row-${index}`} className="border-b border-slate-800/60">
                                        <td className="py-1.5 font-sans">{row.line}</td>
                                        <td className="py-1.5 font-sans">{row.shift}</td>
                                        <td className="py-1.5">{row.units}</td>
                                        <td className="py-1.5">{row.target}</td>
                                        <td className={clsx('py-1.5', row.variance < 0 ? 'text-red-300' : 'text-emerald-300')}>{row.variance}</td>
                                        <td className="py-1.5">{formatPercent(row.attainment, 1)}</td>
                                        <td className="py-1.5">{row.scrapPct.toFixed(2)}%</td>
                                        <td className="py-1.5">{row.downtimeHours.toFixed(1)}</td>
                                    </tr>
                                ))}
                            </tbody>
                        </table>
                    </section>

                    <KpiBarChart rows={rows} />

                    <p className="text-sm text-sky-300">
                        This page focuses on day-to-day KPIs. Export the edited table above to share with production, quality, and leadership teams.
                    </p>
                </>
            )}
        </div>
    );
}

interface KpiTileProps {
    label: string;
    value: string;
    delta?: string;
    positive?: boolean;
}

function KpiTile({ label, value, delta, positive }: KpiTileProps) {
    return (
        <div className="bg-slate-900/60 border border-slate-800 rounded-lg p-4" data-testid={`kpi-${label}`}>
            <p className="text-xs uppercase text-slate-500">{label}</p>
            <p className="text-2xl font-bold text-white">{value}</p>
            {delta && (
                <p className={clsx('text-sm font-mono', positive ? 'text-emerald-400' : 'text-red-400')}>{delta}</p>
            )}
        </div>
    );
}
