import type { Metadata } from 'next';
import { notFound } from 'next/navigation';
import { FolderSearch } from 'lucide-react';
import PageHeader from '@/components/PageHeader';
import PdfFinder from '@/components/PdfFinder';
import { ENABLE_PDF_FINDER } from '@/lib/appConfig';

export const metadata: Metadata = { title: 'PDF Finder' };

export default function PdfFinderPage() {
    if (!ENABLE_PDF_FINDER) notFound();

    return (
        <div className="min-h-screen bg-grid bg-fixed p-8 relative">
            <div className="max-w-7xl mx-auto relative z-10">
                <PageHeader
                    title="PDF Finder"
                    subtitle="Scan a directory tree for PDF files, see their details, and preview or download them."
                    hintIcon={FolderSearch}
                    hint="Paths resolve on the server."
                />
                <PdfFinder />
            </div>
        </div>
    );
}
