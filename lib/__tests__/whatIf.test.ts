import { describe, expect, it } from 'vitest';
import { estimateDelivery, OPTIMIZATION_GOALS } from '../whatIf';
import { InvalidInputError } from '../errors';

describe('estimateDelivery', () => {
    it('multiplies task count by average hours', () => {
        expect(estimateDelivery({ taskCount: 5, averageHours: 3, dailyCapacityHours: 6 })).toEqual({
            totalHours: 15,
            estimatedDays: 3,
        });
    });

    it('does not add a day when the effort divides evenly', () => {
        expect(estimateDelivery({ taskCount: 4, averageHours: 3, dailyCapacityHours: 6 }).estimatedDays).toBe(2);
    });

    it('needs at least one day for any partial effort', () => {
        expect(estimateDelivery({ taskCount: 1, averageHours: 1, dailyCapacityHours: 12 }).estimatedDays).toBe(1);
    });

    it('rejects a non-positive capacity', () => {
        expect(() => estimateDelivery({ taskCount: 1, averageHours: 1, dailyCapacityHours: 0 })).toThrow(InvalidInputError);
    });

    it('rejects fewer than one task', () => {
        expect(() => estimateDelivery({ taskCount: 0, averageHours: 1, dailyCapacityHours: 6 })).toThrow(
            'Number of tasks must be at least 1.'
        );
    });
});

describe('OPTIMIZATION_GOALS', () => {
    it('lists the three planning goals', () => {
        expect(OPTIMIZATION_GOALS.map(goal => goal.title)).toEqual([
            'Balanced Workload',
            'Deadline Driven',
            'Focus Blocks',
        ]);
    });
});
