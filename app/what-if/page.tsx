import type { Metadata } from 'next';
import { Calculator } from 'lucide-react';
import PageHeader from '@/components/PageHeader';
import WhatIfCalculator from '@/components/WhatIfCalculator';

export const metadata: Metadata = { title: 'What-if Analysis' };

export default function WhatIfPage() {
    return (
        <div className="min-h-screen bg-grid bg-fixed p-8 relative">
            <div className="max-w-5xl mx-auto relative z-10">
                <PageHeader
                    title="Scheduling Optimizing"
                    subtitle="Guidance and interactive controls for planning a more effective schedule."
                    hint="Effort ÷ capacity, rounded up to whole days."
                    hintIcon={Calculator}
                />
                <WhatIfCalculator />
            </div>
        </div>
    );
}
