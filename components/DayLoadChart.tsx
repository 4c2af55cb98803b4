import clsx from 'clsx';
import { DayAssignment } from '@/types';
import { formatHours } from '@/lib/scheduler';

interface DayLoadChartProps {
    days: DayAssignment[];
    dailyCapacityHours: number;
}

export default function DayLoadChart({ days, dailyCapacityHours }: DayLoadChartProps) {
    // Scale bars so the capacity line sits at a fixed point unless a day exceeds it
    const maxHours = Math.max(dailyCapacityHours, ...days.map(day => day.totalHours));

    return (
        <div className="bg-slate-900/60 p-4 rounded-lg border border-slate-800">
            <h3 className="text-lg font-bold mb-4 text-white">Daily Load</h3>
            <div className="space-y-3">
                {days.map(day => (
                    <div key={day.dayIndex} data-testid={`load-day-${day.dayIndex}`}>
                        <div className="flex justify-between text-sm mb-1 text-slate-300">
                            <span>Day {day.dayIndex}</span>
                            <span className={clsx(day.isOverloaded && 'text-red-400 font-semibold')}>
                                {formatHours(day.totalHours)} / {dailyCapacityHours} h
                            </span>
                        </div>
                        <div className="relative w-full bg-slate-800 rounded-full h-4">
                            <div
                                className={clsx('h-4 rounded-full', day.isOverloaded ? 'bg-red-500' : 'bg-cyan-500')}
                                style={{ width: `${(day.totalHours / maxHours) * 100}%` }}
                            />
                            <div
                                className="absolute top-0 h-4 border-r-2 border-dashed border-amber-300"
                                style={{ left: `${(dailyCapacityHours / maxHours) * 100}%` }}
                            />
                        </div>
                    </div>
                ))}
            </div>
        </div>
    );
}
