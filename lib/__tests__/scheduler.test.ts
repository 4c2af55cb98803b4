import { describe, expect, it } from 'vitest';
import { Task } from '@/types';
import { formatHours, remainingCapacity, schedule, sortByDueDate, summarizeSchedule } from '../scheduler';
import { InvalidInputError } from '../errors';

const task = (name: string, hours: number, due?: string): Task => ({
    name,
    hours,
    dueDate: due ? new Date(`${due}T00:00:00`) : null,
});

const captureError = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected the call to throw');
};

const names = (tasks: Task[]) => tasks.map(t => t.name);

// Small deterministic generator so property checks are reproducible
const makeRandom = (seed: number) => {
    let state = seed;
    return () => {
        state = (state * 1103515245 + 12345) % 2147483648;
        return state / 2147483648;
    };
};

const randomBacklog = (random: () => number, size: number): Task[] =>
    Array.from({ length: size }, (_, i) => {
        const hasDue = random() < 0.7;
        const day = 1 + Math.floor(random() * 5);
        return task(`T${i}`, Math.floor(random() * 9), hasDue ? `2024-03-0${day}` : undefined);
    });

describe('schedule', () => {
    it('opens a new day when the next task would overflow the current one', () => {
        const days = schedule([task('A', 3, '2024-01-01'), task('B', 4, '2024-01-02')], 5);

        expect(days).toHaveLength(2);
        expect(days[0]).toMatchObject({ dayIndex: 1, totalHours: 3, isOverloaded: false });
        expect(names(days[0].tasks)).toEqual(['A']);
        expect(days[1]).toMatchObject({ dayIndex: 2, totalHours: 4, isOverloaded: false });
        expect(names(days[1].tasks)).toEqual(['B']);
    });

    it('packs tasks sharing a due date into the same day while they fit', () => {
        const days = schedule([task('A', 2, '2024-01-01'), task('B', 2, '2024-01-01')], 5);

        expect(days).toHaveLength(1);
        expect(names(days[0].tasks)).toEqual(['A', 'B']);
        expect(days[0].totalHours).toBe(4);
        expect(days[0].isOverloaded).toBe(false);
    });

    it('places an oversized task alone on its own overloaded day', () => {
        const days = schedule([task('X', 10)], 6);

        expect(days).toEqual([
            { dayIndex: 1, tasks: [task('X', 10)], totalHours: 10, isOverloaded: true },
        ]);
    });

    it('returns an empty schedule for an empty backlog', () => {
        expect(schedule([], 8)).toEqual([]);
    });

    it('rejects a non-positive capacity', () => {
        expect(() => schedule([], -1)).toThrow(InvalidInputError);
        expect(() => schedule([task('A', 1)], 0)).toThrow(InvalidInputError);

        const error = captureError(() => schedule([], -1));
        expect(error).toBeInstanceOf(InvalidInputError);
        expect(error).toHaveProperty('field', 'dailyCapacityHours');
    });

    it('rejects a capacity that is not a finite number', () => {
        expect(() => schedule([], Number.NaN)).toThrow(InvalidInputError);
    });

    it('rejects negative task hours and names the offending task', () => {
        expect(() => schedule([task('A', 1), task('B', -2)], 8)).toThrow(
            new InvalidInputError('tasks[1].hours', 'Task "B" must have non-negative hours (got -2).')
        );
    });

    it('fills a day exactly to capacity without flagging it', () => {
        const days = schedule([task('A', 2, '2024-01-01'), task('B', 3, '2024-01-02')], 5);

        expect(days).toHaveLength(1);
        expect(days[0].totalHours).toBe(5);
        expect(days[0].isOverloaded).toBe(false);
    });

    it('starts a new day after an overloaded one', () => {
        const days = schedule([task('X', 10, '2024-01-01'), task('Y', 1, '2024-01-02')], 6);

        expect(days.map(d => names(d.tasks))).toEqual([['X'], ['Y']]);
        expect(days.map(d => d.isOverloaded)).toEqual([true, false]);
    });

    it('keeps zero-hour tasks in order without adding load', () => {
        const days = schedule([task('A', 5, '2024-01-01'), task('Z', 0, '2024-01-02')], 5);

        expect(days).toHaveLength(1);
        expect(names(days[0].tasks)).toEqual(['A', 'Z']);
        expect(days[0].totalHours).toBe(5);
    });

    it('schedules by due date, putting undated tasks last', () => {
        const days = schedule(
            [task('U1', 1), task('D2', 1, '2024-02-02'), task('U2', 1), task('D1', 1, '2024-02-01')],
            2
        );

        expect(days.map(d => names(d.tasks))).toEqual([['D1', 'D2'], ['U1', 'U2']]);
    });

    it('does not mutate its input', () => {
        const backlog = [task('B', 1, '2024-01-02'), task('A', 1, '2024-01-01')];
        const snapshot = backlog.map(t => ({ ...t }));

        schedule(backlog, 4);

        expect(backlog).toEqual(snapshot);
    });

    it('returns identical output for identical input', () => {
        const backlog = randomBacklog(makeRandom(7), 12);
        expect(schedule(backlog, 6)).toEqual(schedule(backlog, 6));
    });

    describe('invariants over generated backlogs', () => {
        const random = makeRandom(42);
        const cases = Array.from({ length: 25 }, (_, i) => ({
            backlog: randomBacklog(random, 1 + (i % 10)),
            capacity: 1 + Math.floor(random() * 10),
        }));

        it.each(cases)('holds for case %#', ({ backlog, capacity }) => {
            const days = schedule(backlog, capacity);

            // Every task exactly once, in due-date order
            const placed = days.flatMap(d => d.tasks);
            expect(placed).toEqual(sortByDueDate(backlog));

            days.forEach((day, index) => {
                expect(day.dayIndex).toBe(index + 1);
                expect(day.tasks.length).toBeGreaterThan(0);
                expect(day.totalHours).toBe(day.tasks.reduce((sum, t) => sum + t.hours, 0));
                expect(day.isOverloaded).toBe(day.totalHours > capacity);
                if (day.isOverloaded) {
                    expect(day.tasks).toHaveLength(1);
                }
            });
        });
    });
});

describe('sortByDueDate', () => {
    it('breaks ties on input order', () => {
        const sorted = sortByDueDate([
            task('C', 1, '2024-05-01'),
            task('A', 1, '2024-04-01'),
            task('D', 1, '2024-05-01'),
            task('B', 1, '2024-04-01'),
        ]);

        expect(names(sorted)).toEqual(['A', 'B', 'C', 'D']);
    });
});

describe('summary helpers', () => {
    it('reports remaining capacity and totals', () => {
        const days = schedule([task('A', 4, '2024-01-01'), task('B', 9, '2024-01-02')], 6);

        expect(remainingCapacity(days[0], 6)).toBe(2);
        expect(remainingCapacity(days[1], 6)).toBe(0);
        expect(summarizeSchedule(days)).toEqual({ totalDays: 2, totalHours: 13, overloadedDays: 1 });
    });
});

describe('formatHours', () => {
    it('rounds float noise to two decimals', () => {
        expect(formatHours(0.1 + 0.2)).toBe('0.3');
        expect(formatHours(6.1 - 6)).toBe('0.1');
        expect(formatHours(2.346)).toBe('2.35');
        expect(formatHours(8)).toBe('8');
    });
});
