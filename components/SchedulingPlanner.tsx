'use client';

import { useMemo, useState } from 'react';
import { Info } from 'lucide-react';
import { DayAssignment } from '@/types';
import { DEFAULT_BACKLOG, parseTasks } from '@/lib/taskParser';
import { formatHours, schedule, sortByDueDate, summarizeSchedule } from '@/lib/scheduler';
import { isInvalidInputError } from '@/lib/errors';
import TaskBacklogInput from './TaskBacklogInput';
import BacklogTable from './BacklogTable';
import ScheduleBoard from './ScheduleBoard';
import DayLoadChart from './DayLoadChart';
import OverloadAlert from './OverloadAlert';

const MIN_CAPACITY = 1;
const MAX_CAPACITY = 12;

interface SchedulingPlannerProps {
    initialBacklog?: string;
    initialCapacity: number;
}

type ScheduleOutcome =
    | { ok: true; days: DayAssignment[] }
    | { ok: false; error: string };

export default function SchedulingPlanner({ initialBacklog = DEFAULT_BACKLOG, initialCapacity }: SchedulingPlannerProps) {
    const [backlogText, setBacklogText] = useState(initialBacklog);
    const [capacity, setCapacity] = useState(initialCapacity);

    const parsed = useMemo(() => parseTasks(backlogText), [backlogText]);
    const sortedTasks = useMemo(() => sortByDueDate(parsed.tasks), [parsed.tasks]);

    const outcome = useMemo<ScheduleOutcome>(() => {
        try {
            return { ok: true, days: schedule(parsed.tasks, capacity) };
        } catch (error) {
            if (isInvalidInputError(error)) {
                return { ok: false, error: error.message };
            }
            throw error;
        }
    }, [parsed.tasks, capacity]);

    const summary = outcome.ok ? summarizeSchedule(outcome.days) : null;

    return (
        <div className="grid gap-8 lg:grid-cols-[320px_1fr]">
            <aside className="space-y-6">
                <div className="bg-slate-900/60 border border-slate-800 rounded-lg p-4">
                    <h2 className="text-lg font-semibold text-white mb-3">Configuration</h2>
                    <label htmlFor="daily-capacity" className="flex justify-between text-sm text-slate-300 mb-2">
                        <span>Hours per day</span>
                        <span className="font-mono text-cyan-300">{capacity}</span>
                    </label>
                    <input
                        id="daily-capacity"
                        type="range"
                        min={MIN_CAPACITY}
                        max={MAX_CAPACITY}
                        value={capacity}
                        onChange={(e) => setCapacity(Number(e.target.value))}
                        className="w-full accent-cyan-500"
                    />
                    <p className="text-xs text-slate-500 mt-2">
                        Adjust the slider to see how the schedule changes when the daily capacity increases or decreases.
                    </p>
                </div>
                <TaskBacklogInput value={backlogText} errors={parsed.errors} onChange={setBacklogText} />
            </aside>

            <div className="space-y-8">
                {sortedTasks.length > 0 && (
                    <section>
                        <h2 className="text-xl font-semibold text-white mb-3">Task backlog</h2>
                        <BacklogTable tasks={sortedTasks} />
                    </section>
                )}

                {!outcome.ok && (
                    <div role="alert" className="bg-red-950/40 border-l-4 border-red-500 p-4 text-red-200">
                        {outcome.error}
                    </div>
                )}

                {outcome.ok && outcome.days.length === 0 && (
                    <div className="flex items-center gap-2 text-sky-300 bg-sky-950/40 border border-sky-900 rounded-lg p-4">
                        <Info className="w-4 h-4" />
                        Add a task to see the generated schedule.
                    </div>
                )}

                {outcome.ok && outcome.days.length > 0 && summary && (
                    <section className="space-y-4">
                        <div className="flex items-baseline justify-between">
                            <h2 className="text-xl font-semibold text-white">Suggested Schedule</h2>
                            <span className="text-sm text-slate-400 font-mono">
                                {summary.totalDays} days · {formatHours(summary.totalHours)}h total
                            </span>
                        </div>
                        <OverloadAlert days={outcome.days} dailyCapacityHours={capacity} />
                        <DayLoadChart days={outcome.days} dailyCapacityHours={capacity} />
                        <ScheduleBoard days={outcome.days} dailyCapacityHours={capacity} />
                    </section>
                )}
            </div>
        </div>
    );
}
