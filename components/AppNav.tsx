import Link from 'next/link';
import { ENABLE_PDF_FINDER } from '@/lib/appConfig';

interface NavLink {
    label: string;
    href: string;
}

export const buildNavLinks = (pdfFinderEnabled: boolean): NavLink[] => [
    { label: 'Scheduling', href: '/scheduling' },
    { label: 'What-if', href: '/what-if' },
    { label: 'KPI Report', href: '/kpi-report' },
    ...(pdfFinderEnabled ? [{ label: 'PDF Finder', href: '/pdf-finder' }] : []),
];

export default function AppNav({ pdfFinderEnabled = ENABLE_PDF_FINDER }: { pdfFinderEnabled?: boolean }) {
    return (
        <nav aria-label="Modules" className="sticky top-0 z-20 border-b border-slate-800/80 bg-slate-950/80 backdrop-blur">
            <div className="max-w-6xl mx-auto flex items-center gap-6 px-6 h-12 text-sm">
                <Link href="/" className="font-semibold text-white tracking-tight">
                    Capacity Planner
                </Link>
                <ul className="flex items-center gap-4 text-slate-400">
                    {buildNavLinks(pdfFinderEnabled).map(link => (
                        <li key={link.href}>
                            <Link href={link.href} className="hover:text-cyan-300 transition-colors">
                                {link.label}
                            </Link>
                        </li>
                    ))}
                </ul>
            </div>
        </nav>
    );
}
