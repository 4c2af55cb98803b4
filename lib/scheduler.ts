import { Task, DayAssignment } from '@/types';
import { compareAsc } from 'date-fns';
import { InvalidInputError } from './errors';

const validateCapacity = (dailyCapacityHours: number) => {
    if (!Number.isFinite(dailyCapacityHours) || dailyCapacityHours <= 0) {
        throw new InvalidInputError(
            'dailyCapacityHours',
            `Daily capacity must be a positive number of hours (got ${dailyCapacityHours}).`
        );
    }
};

const validateTasks = (tasks: readonly Task[]) => {
    tasks.forEach((task, index) => {
        if (!Number.isFinite(task.hours) || task.hours < 0) {
            throw new InvalidInputError(
                `tasks[${index}].hours`,
                `Task "${task.name}" must have non-negative hours (got ${task.hours}).`
            );
        }
    });
};

/**
 * Order tasks by due date, earliest first. Undated tasks go after every dated
 * task; ties keep their input order.
 */
export const sortByDueDate = (tasks: readonly Task[]): Task[] =>
    tasks
        .map((task, index) => ({ task, index }))
        .sort((a, b) => {
            const aDue = a.task.dueDate;
            const bDue = b.task.dueDate;

            if (aDue && bDue) {
                const byDate = compareAsc(aDue, bDue);
                if (byDate !== 0) return byDate;
            } else if (aDue) {
                return -1;
            } else if (bDue) {
                return 1;
            }

            return a.index - b.index;
        })
        .map(({ task }) => task);

/**
 * Greedy first-fit packing of the backlog into working days.
 *
 * Tasks are placed in due-date order. A task joins the current day if it still
 * fits under `dailyCapacityHours`, or if the day is empty (an oversized task
 * gets a day to itself and is flagged overloaded). Otherwise a new day opens.
 * The order is never rearranged to save days.
 *
 * @throws InvalidInputError when capacity is not positive or any task has negative hours
 */
export const schedule = (tasks: readonly Task[], dailyCapacityHours: number): DayAssignment[] => {
    validateCapacity(dailyCapacityHours);
    validateTasks(tasks);

    const days: DayAssignment[] = [];
    let currentTasks: Task[] = [];
    let currentHours = 0;

    const closeDay = () => {
        days.push({
            dayIndex: days.length + 1,
            tasks: currentTasks,
            totalHours: currentHours,
            isOverloaded: currentHours > dailyCapacityHours,
        });
        currentTasks = [];
        currentHours = 0;
    };

    for (const task of sortByDueDate(tasks)) {
        const fits = currentHours + task.hours <= dailyCapacityHours;
        if (!fits && currentTasks.length > 0) {
            closeDay();
        }

        currentTasks.push(task);
        currentHours += task.hours;
    }

    if (currentTasks.length > 0) {
        closeDay();
    }

    return days;
};

export const remainingCapacity = (day: DayAssignment, dailyCapacityHours: number): number =>
    Math.max(0, dailyCapacityHours - day.totalHours);

export const summarizeSchedule = (days: readonly DayAssignment[]) => ({
    totalDays: days.length,
    totalHours: days.reduce((sum, day) => sum + day.totalHours, 0),
    overloadedDays: days.filter(day => day.isOverloaded).length,
});

/** Hours for display, rounded to two decimals so float sums read cleanly. */
export const formatHours = (hours: number): string => String(Math.round(hours * 100) / 100);
