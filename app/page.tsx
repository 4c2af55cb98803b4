import React from 'react';
import Link from 'next/link';
import {
  CalendarClock, Calculator, Gauge, FolderSearch,
  ChevronRight,
} from 'lucide-react';
import { ENABLE_PDF_FINDER } from '@/lib/appConfig';

// ─────────────────────────────────────────────────────────────────
// HOME PORTAL
// ─────────────────────────────────────────────────────────────────

interface PortalModule {
  title: string;
  subtitle: string;
  icon: React.ReactNode;
  description: string;
  href: string;
  highlight?: boolean;
}

const MODULES: PortalModule[] = [
  {
    title: 'Scheduling Optimizer',
    subtitle: 'Backlog Planner',
    icon: <CalendarClock className="w-8 h-8" />,
    description: 'Sort the backlog by due date and pack it into days at your daily capacity.',
    href: '/scheduling',
    highlight: true,
  },
  {
    title: 'What-if Analysis',
    subtitle: 'Delivery Estimate',
    icon: <Calculator className="w-8 h-8" />,
    description: 'See how task count, effort, and capacity move the delivery timeline.',
    href: '/what-if',
  },
  {
    title: 'KPI Production Report',
    subtitle: 'Line Performance',
    icon: <Gauge className="w-8 h-8" />,
    description: 'Enter line/shift output and review attainment, variance, scrap, and downtime.',
    href: '/kpi-report',
  },
  ...(ENABLE_PDF_FINDER ? [{
    title: 'PDF Finder',
    subtitle: 'Document Lookup',
    icon: <FolderSearch className="w-8 h-8" />,
    description: 'Scan a directory tree for PDFs, then preview or download them.',
    href: '/pdf-finder',
  }] : []),
];

export default function HomePortal() {
  return (
    <div className="min-h-screen bg-grid bg-fixed text-slate-100 font-sans relative overflow-hidden">
      <div className="fixed top-10 left-1/2 -translate-x-1/2 w-[700px] h-[400px] bg-cyan-500/10 rounded-full blur-[120px] pointer-events-none" />

      <div className="relative z-10 min-h-screen flex flex-col items-center justify-center p-6">
        <header className="mb-14 text-center max-w-2xl mx-auto w-full">
          <h1 className="text-4xl md:text-5xl font-black text-transparent bg-clip-text bg-gradient-to-b from-white via-slate-300 to-slate-500 tracking-tight">
            Capacity Planner
          </h1>
          <div className="h-px w-32 mx-auto bg-gradient-to-r from-transparent via-slate-400 to-transparent my-3 opacity-50" />
          <p className="text-slate-400 font-mono text-xs tracking-[0.3em] uppercase">
            Scheduling • What-if • Production KPIs
          </p>
        </header>

        <div className="max-w-5xl w-full grid grid-cols-1 md:grid-cols-2 gap-8">
          {MODULES.map((mod) => (
            <PortalCard key={mod.href} {...mod} />
          ))}
        </div>
      </div>
    </div>
  );
}


// ─── Portal Card Component ──────────────────────────────────────

function PortalCard({ title, subtitle, icon, description, href, highlight }: PortalModule) {
  return (
    <Link
      href={href}
      className={`
        group relative block bg-slate-900/70 border rounded-xl overflow-hidden transition-all duration-300
        hover:-translate-y-1.5 hover:shadow-[0_12px_40px_-10px_rgba(0,0,0,0.9)]
        ${highlight ? 'border-cyan-500/50 shadow-[0_0_20px_rgba(34,211,238,0.1)]' : 'border-slate-800 hover:border-slate-600'}
      `}
    >
      <div className="p-6 flex flex-col h-full">
        <div className={`mb-5 w-fit p-3 rounded bg-slate-950 border border-slate-800 transition-colors ${highlight ? 'text-cyan-300' : 'text-slate-400 group-hover:text-white'}`}>
          {icon}
        </div>
        <h2 className={`text-xl font-bold mb-1 ${highlight ? 'text-cyan-300' : 'text-slate-200 group-hover:text-white'}`}>
          {title}
        </h2>
        <p className="text-xs font-bold text-slate-500 uppercase tracking-widest mb-4 border-b border-slate-800 pb-2">
          {subtitle}
        </p>
        <p className="text-sm text-slate-400 leading-relaxed mb-6">{description}</p>
        <span className="mt-auto self-end text-xs font-bold uppercase tracking-wider flex items-center gap-2 text-slate-400 group-hover:text-white">
          Open <ChevronRight className="w-3 h-3" />
        </span>
      </div>
    </Link>
  );
}
