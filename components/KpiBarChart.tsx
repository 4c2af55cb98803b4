import { ProductionRow } from '@/types';

interface KpiBarChartProps {
    rows: ProductionRow[];
}

export default function KpiBarChart({ rows }: KpiBarChartProps) {
    const maxValue = Math.max(1, ...rows.flatMap(row => [row.units, row.target]));

    return (
        <div className="bg-slate-900/60 p-4 rounded-lg border border-slate-800">
            <h3 className="text-lg font-bold mb-1 text-white">Output vs. target</h3>
            <div className="flex gap-4 text-xs text-slate-400 mb-4">
                <span className="flex items-center gap-1"><span className="w-3 h-3 rounded-sm bg-cyan-500 block" /> Actual</span>
                <span className="flex items-center gap-1"><span className="w-3 h-3 rounded-sm bg-slate-500 block" /> Target</span>
            </div>
            <div className="flex items-end gap-6 h-[300px]">
                {rows.map((row, index) => (
                    <div key={`${row.line}-${index}`} className="flex-1 flex flex-col items-center h-full">
                        <div className="flex-1 w-full flex items-end justify-center gap-1">
                            <div
                                title={`Actual: ${row.units}`}
                                className="w-1/3 bg-cyan-500 rounded-t"
                                style={{ height: `${(Math.max(0, row.units) / maxValue) * 100}%` }}
                            />
                            <div
                                title={`Target: ${row.target}`}
                                className="w-1/3 bg-slate-500 rounded-t"
                                style={{ height: `${(Math.max(0, row.target) / maxValue) * 100}%` }}
                            />
                        </div>
                        <span className="text-xs text-slate-300 mt-2 truncate max-w-full">{row.line}</span>
                    </div>
                ))}
            </div>
        </div>
    );
}
