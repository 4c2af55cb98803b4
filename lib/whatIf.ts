import { OptimizationGoal, WhatIfEstimate, WhatIfInput } from '@/types';
import { InvalidInputError } from './errors';

export const WHAT_IF_LIMITS = {
    taskCount: { min: 1, default: 5 },
    averageHours: { min: 1, max: 8, default: 3 },
    dailyCapacityHours: { min: 1, max: 12, default: 6 },
} as const;

export const OPTIMIZATION_GOALS: OptimizationGoal[] = [
    { title: 'Balanced Workload', description: 'Distribute tasks so that no single day is overloaded.' },
    { title: 'Deadline Driven', description: 'Prioritize items with the earliest deadline first.' },
    { title: 'Focus Blocks', description: 'Group similar work together to reduce context switching.' },
];

/**
 * Total effort and delivery days for a uniform backlog.
 * Days round up unless the overshoot is under 0.001 of a day.
 */
export const estimateDelivery = (input: WhatIfInput): WhatIfEstimate => {
    const { taskCount, averageHours, dailyCapacityHours } = input;

    if (!Number.isFinite(dailyCapacityHours) || dailyCapacityHours <= 0) {
        throw new InvalidInputError('dailyCapacityHours', 'Daily capacity must be greater than 0.');
    }
    if (!Number.isFinite(taskCount) || taskCount < 1) {
        throw new InvalidInputError('taskCount', 'Number of tasks must be at least 1.');
    }
    if (!Number.isFinite(averageHours) || averageHours < 0) {
        throw new InvalidInputError('averageHours', 'Average hours per task cannot be negative.');
    }

    const totalHours = taskCount * averageHours;
    const estimatedDays = Math.round(totalHours / dailyCapacityHours + 0.499);

    return { totalHours, estimatedDays };
};
