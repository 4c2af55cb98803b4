interface TaskBacklogInputProps {
    value: string;
    errors: string[];
    onChange: (value: string) => void;
}

export default function TaskBacklogInput({ value, errors, onChange }: TaskBacklogInputProps) {
    return (
        <div>
            <label htmlFor="task-backlog" className="block text-sm font-medium text-slate-300 mb-2">
                Tasks
            </label>
            <textarea
                id="task-backlog"
                value={value}
                onChange={(e) => onChange(e.target.value)}
                rows={8}
                spellCheck={false}
                className="w-full px-4 py-2 bg-slate-900 border border-slate-700 rounded-lg font-mono text-sm text-slate-100 focus:ring-2 focus:ring-cyan-500 focus:border-transparent"
            />
            <p className="text-xs text-slate-500 mt-1">
                One task per line using &apos;name | hours | YYYY-MM-DD(optional)&apos;.
            </p>
            {errors.length > 0 && (
                <div role="status" className="mt-3 bg-amber-950/40 border-l-4 border-amber-500 p-3 text-sm text-amber-200">
                    {errors.map(error => <p key={error}>{error}</p>)}
                </div>
            )}
        </div>
    );
}
