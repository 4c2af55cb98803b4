import type { Metadata } from 'next';
import { Gauge } from 'lucide-react';
import PageHeader from '@/components/PageHeader';
import KpiReport from '@/components/KpiReport';

export const metadata: Metadata = { title: 'KPI Report' };

export default function KpiReportPage() {
    return (
        <div className="min-h-screen bg-grid bg-fixed p-8 relative">
            <div className="max-w-7xl mx-auto relative z-10">
                <PageHeader
                    title="KPI Production Report"
                    subtitle="Monitor production KPIs for each line/shift, update live values, and review trends against goals."
                    hint="Import or export CSV/XLSX."
                    hintIcon={Gauge}
                />
                <KpiReport />
            </div>
        </div>
    );
}
