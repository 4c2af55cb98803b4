import Link from 'next/link';
import { ArrowLeft, LucideIcon } from 'lucide-react';

interface PageHeaderProps {
    title: string;
    subtitle: string;
    hint?: string;
    hintIcon?: LucideIcon;
}

export default function PageHeader({ title, subtitle, hint, hintIcon: HintIcon }: PageHeaderProps) {
    return (
        <div className="flex items-center justify-between mb-8">
            <div className="flex items-center gap-4">
                <Link href="/" aria-label="Back to portal" className="p-2 rounded-lg hover:bg-slate-800 transition-colors text-slate-400 hover:text-white">
                    <ArrowLeft className="w-5 h-5" />
                </Link>
                <div>
                    <h1 className="text-3xl font-bold text-white tracking-tight">{title}</h1>
                    <p className="text-slate-400 text-sm">{subtitle}</p>
                </div>
            </div>
            {hint && (
                <div className="hidden md:flex items-center gap-2 text-xs text-slate-500 font-mono">
                    {HintIcon && <HintIcon className="w-4 h-4 text-cyan-400" />}
                    {hint}
                </div>
            )}
        </div>
    );
}
