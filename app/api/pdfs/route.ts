import { NextRequest, NextResponse } from 'next/server';
import { ENABLE_PDF_FINDER, getPdfFinderRoot } from '@/lib/appConfig';
import { findPdfs, resolveBaseDirectory } from '@/lib/pdfFinder';
import { PdfListing } from '@/types';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
    if (!ENABLE_PDF_FINDER) {
        return NextResponse.json({ error: 'PDF finder is disabled' }, { status: 404 });
    }

    try {
        const resolved = await resolveBaseDirectory(request.nextUrl.searchParams.get('dir'), getPdfFinderRoot());
        if (!resolved.ok) {
            return NextResponse.json({ error: resolved.error }, { status: 400 });
        }

        const listing: PdfListing = {
            baseDir: resolved.baseDir,
            files: await findPdfs(resolved.baseDir),
        };
        return NextResponse.json(listing);
    } catch (error) {
        console.error('PDF scan error:', error);
        return NextResponse.json({ error: 'Failed to scan directory for PDFs' }, { status: 500 });
    }
}
