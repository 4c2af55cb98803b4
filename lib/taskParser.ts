import { ParseResult, Task } from '@/types';
import { isValid, parse } from 'date-fns';

const DUE_DATE_FORMAT = 'yyyy-MM-dd';
const DEFAULT_TASK_HOURS = 1;
// Plain decimal only: no hex, binary or octal literals
const HOURS_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const DEFAULT_BACKLOG = [
    'Design review | 2 | 2024-07-01',
    'Prototype API | 4 | 2024-06-25',
    'Write documentation | 3',
    'Team sync | 1 | 2024-06-20',
    'QA pass | 2',
].join('\n');

const parseDueDate = (value: string): Date | null => {
    const parsed = parse(value, DUE_DATE_FORMAT, new Date(0));
    return isValid(parsed) ? parsed : null;
};

/**
 * Parse the backlog text area: one task per line as
 * `name | hours | YYYY-MM-DD`, hours and date optional.
 *
 * Bad lines are skipped and reported; the rest still parse.
 */
export const parseTasks = (raw: string): ParseResult => {
    const tasks: Task[] = [];
    const errors: string[] = [];

    raw.split(/\r?\n/).forEach((line, index) => {
        const lineNo = index + 1;
        if (!line.trim()) return;

        const [name = '', hoursText = '', dueText = ''] = line.split('|').map(part => part.trim());
        if (!name) {
            errors.push(`Line ${lineNo}: Task name is required.`);
            return;
        }

        const hours = hoursText ? Number(hoursText) : DEFAULT_TASK_HOURS;
        if ((hoursText && !HOURS_PATTERN.test(hoursText)) || !Number.isFinite(hours)) {
            errors.push(`Line ${lineNo}: Hours must be a number (got '${hoursText}').`);
            return;
        }
        if (hours < 0) {
            errors.push(`Line ${lineNo}: Hours cannot be negative (got '${hoursText}').`);
            return;
        }

        let dueDate: Date | null = null;
        if (dueText) {
            dueDate = parseDueDate(dueText);
            if (!dueDate) {
                errors.push(`Line ${lineNo}: Due date must be YYYY-MM-DD (got '${dueText}').`);
                return;
            }
        }

        tasks.push({ name, hours, dueDate });
    });

    return { tasks, errors };
};
