'use client';

import { useState } from 'react';
import { Clock, CalendarRange, Target } from 'lucide-react';
import { estimateDelivery, OPTIMIZATION_GOALS, WHAT_IF_LIMITS } from '@/lib/whatIf';

export default function WhatIfCalculator() {
    const [taskCount, setTaskCount] = useState<number>(WHAT_IF_LIMITS.taskCount.default);
    const [averageHours, setAverageHours] = useState<number>(WHAT_IF_LIMITS.averageHours.default);
    const [capacity, setCapacity] = useState<number>(WHAT_IF_LIMITS.dailyCapacityHours.default);

    const estimate = estimateDelivery({ taskCount, averageHours, dailyCapacityHours: capacity });

    const updateTaskCount = (value: string) => {
        const parsed = parseInt(value, 10);
        setTaskCount(Number.isFinite(parsed) ? Math.max(WHAT_IF_LIMITS.taskCount.min, parsed) : WHAT_IF_LIMITS.taskCount.min);
    };

    return (
        <div className="space-y-8">
            <section>
                <h2 className="text-xl font-semibold text-white mb-3 flex items-center gap-2">
                    <Target className="w-5 h-5 text-cyan-400" />
                    Optimization Goals
                </h2>
                <ul className="space-y-1 text-slate-300">
                    {OPTIMIZATION_GOALS.map(goal => (
                        <li key={goal.title}>
                            <span className="font-semibold text-white">{goal.title}</span> — {goal.description}
                        </li>
                    ))}
                </ul>
            </section>

            <section className="bg-slate-900/60 border border-slate-800 rounded-lg p-6">
                <h2 className="text-xl font-semibold text-white mb-4">What-if Analysis</h2>
                <div className="grid gap-6 md:grid-cols-3">
                    <div>
                        <label htmlFor="task-count" className="block text-sm font-medium text-slate-300 mb-2">
                            Number of tasks
                        </label>
                        <input
                            id="task-count"
                            type="number"
                            min={WHAT_IF_LIMITS.taskCount.min}
                            value={taskCount}
                            onChange={(e) => updateTaskCount(e.target.value)}
                            className="w-full px-4 py-2 bg-slate-950 border border-slate-700 rounded-lg text-slate-100"
                        />
                    </div>
                    <div>
                        <label htmlFor="average-hours" className="flex justify-between text-sm font-medium text-slate-300 mb-2">
                            <span>Average hours per task</span>
                            <span className="font-mono text-cyan-300">{averageHours}</span>
                        </label>
                        <input
                            id="average-hours"
                            type="range"
                            min={WHAT_IF_LIMITS.averageHours.min}
                            max={WHAT_IF_LIMITS.averageHours.max}
                            value={averageHours}
                            onChange={(e) => setAverageHours(Number(e.target.value))}
                            className="w-full accent-cyan-500"
                        />
                    </div>
                    <div>
                        <label htmlFor="what-if-capacity" className="flex justify-between text-sm font-medium text-slate-300 mb-2">
                            <span>Daily capacity (hours)</span>
                            <span className="font-mono text-cyan-300">{capacity}</span>
                        </label>
                        <input
                            id="what-if-capacity"
                            type="range"
                            min={WHAT_IF_LIMITS.dailyCapacityHours.min}
                            max={WHAT_IF_LIMITS.dailyCapacityHours.max}
                            value={capacity}
                            onChange={(e) => setCapacity(Number(e.target.value))}
                            className="w-full accent-cyan-500"
                        />
                    </div>
                </div>

                <div className="grid gap-4 md:grid-cols-2 mt-6">
                    <div className="bg-slate-950 border border-slate-800 rounded-lg p-4">
                        <p className="text-xs uppercase text-slate-500 flex items-center gap-1"><Clock className="w-3 h-3" /> Total effort</p>
                        <p data-testid="total-effort" className="text-2xl font-bold text-white">{estimate.totalHours} hours</p>
                    </div>
                    <div className="bg-slate-950 border border-slate-800 rounded-lg p-4">
                        <p className="text-xs uppercase text-slate-500 flex items-center gap-1"><CalendarRange className="w-3 h-3" /> Estimated days</p>
                        <p data-testid="estimated-days" className="text-2xl font-bold text-white">{estimate.estimatedDays}</p>
                    </div>
                </div>

                <p className="text-sm text-sky-300 mt-6">
                    Use this simple what-if calculator to see how adjusting the number of tasks or daily capacity affects your delivery timeline.
                </p>
            </section>
        </div>
    );
}
