import { format } from 'date-fns';
import { Task } from '@/types';

interface BacklogTableProps {
    tasks: Task[];
}

export const formatDueDate = (dueDate: Date | null, fallback = '—'): string =>
    dueDate ? format(dueDate, 'yyyy-MM-dd') : fallback;

export default function BacklogTable({ tasks }: BacklogTableProps) {
    return (
        <table className="w-full text-sm text-left">
            <thead className="text-xs uppercase text-slate-500 border-b border-slate-800">
                <tr>
                    <th className="py-2 pr-4">Task</th>
                    <th className="py-2 pr-4">Hours</th>
                    <th className="py-2">Due</th>
                </tr>
            </thead>
            <tbody>
                {tasks.map((task, index) => (
                    <tr key={`${task.name}-${index}`} className="border-b border-slate-800/60 text-slate-200">
                        <td className="py-2 pr-4">{task.name}</td>
                        <td className="py-2 pr-4 font-mono">{task.hours}</td>
                        <td className="py-2 font-mono">{formatDueDate(task.dueDate)}</td>
                    </tr>
                ))}
            </tbody>
        </table>
    );
}
