import clsx from 'clsx';
import { CalendarDays } from 'lucide-react';
import { DayAssignment } from '@/types';
import { formatHours, remainingCapacity } from '@/lib/scheduler';
import { formatDueDate } from './BacklogTable';

interface ScheduleBoardProps {
    days: DayAssignment[];
    dailyCapacityHours: number;
}

export default function ScheduleBoard({ days, dailyCapacityHours }: ScheduleBoardProps) {
    return (
        <div className="grid gap-4 md:grid-cols-2 xl:grid-cols-3">
            {days.map(day => (
                <section
                    key={day.dayIndex}
                    aria-label={`Day ${day.dayIndex}`}
                    className={clsx(
                        'p-4 rounded-lg border shadow-sm',
                        day.isOverloaded ? 'bg-red-950/30 border-red-700' : 'bg-slate-900/60 border-slate-800'
                    )}
                >
                    <div className="flex justify-between items-center mb-3">
                        <h3 className="font-bold text-white flex items-center gap-2">
                            <CalendarDays className="w-4 h-4 text-cyan-400" />
                            Day {day.dayIndex} — {formatHours(day.totalHours)}h
                        </h3>
                        {day.isOverloaded ? (
                            <span className="text-xs font-semibold text-red-300 uppercase">Overloaded</span>
                        ) : (
                            <span className="text-xs text-slate-500">{formatHours(remainingCapacity(day, dailyCapacityHours))}h free</span>
                        )}
                    </div>
                    <ul className="space-y-1 text-sm text-slate-300">
                        {day.tasks.map((task, index) => (
                            <li key={`${task.name}-${index}`}>
                                <span className="font-semibold text-slate-100">{task.name}</span> — {task.hours}h
                                (Due: {formatDueDate(task.dueDate, 'No due date')})
                            </li>
                        ))}
                    </ul>
                </section>
            ))}
        </div>
    );
}
