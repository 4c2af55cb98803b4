import { AlertTriangle } from 'lucide-react';
import { DayAssignment } from '@/types';
import { formatHours } from '@/lib/scheduler';

interface OverloadAlertProps {
    days: DayAssignment[];
    dailyCapacityHours: number;
}

export default function OverloadAlert({ days, dailyCapacityHours }: OverloadAlertProps) {
    const overloaded = days.filter(day => day.isOverloaded);
    if (overloaded.length === 0) return null;

    return (
        <div role="alert" className="bg-red-950/40 border-l-4 border-red-500 p-4 mb-4 rounded-r">
            <div className="flex items-start">
                <AlertTriangle className="h-5 w-5 text-red-400 mr-2 mt-0.5 shrink-0" />
                <div>
                    <h3 className="text-red-300 font-bold">
                        {overloaded.length === 1 ? '1 day over capacity' : `${overloaded.length} days over capacity`}
                    </h3>
                    <ul className="text-red-200/80 text-sm mt-1 space-y-0.5">
                        {overloaded.map(day => (
                            <li key={day.dayIndex}>
                                Day {day.dayIndex}: {formatHours(day.totalHours)}h scheduled (Capacity: {dailyCapacityHours}h).
                                Overload: +{formatHours(day.totalHours - dailyCapacityHours)}h.
                            </li>
                        ))}
                    </ul>
                </div>
            </div>
        </div>
    );
}
