import type { Metadata } from 'next';
import { CalendarClock } from 'lucide-react';
import PageHeader from '@/components/PageHeader';
import SchedulingPlanner from '@/components/SchedulingPlanner';
import { DEFAULT_DAILY_CAPACITY } from '@/lib/appConfig';

export const metadata: Metadata = { title: 'Scheduling' };

export default function SchedulingPage() {
    return (
        <div className="min-h-screen bg-grid bg-fixed p-8 relative">
            <div className="fixed top-10 left-1/2 -translate-x-1/2 w-[700px] h-[400px] bg-cyan-500/10 rounded-full blur-[120px] pointer-events-none" />

            <div className="max-w-7xl mx-auto relative z-10">
                <PageHeader
                    title="Scheduling Optimizer"
                    subtitle="Explore how tasks can be distributed across multiple days based on the hours available."
                    hint="Earliest due date first, packed until each day is full."
                    hintIcon={CalendarClock}
                />
                <SchedulingPlanner initialCapacity={DEFAULT_DAILY_CAPACITY} />
            </div>
        </div>
    );
}
