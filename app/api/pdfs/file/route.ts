import { readFile } from 'fs/promises';
import path from 'path';
import { NextRequest, NextResponse } from 'next/server';
import { ENABLE_PDF_FINDER, getPdfFinderRoot } from '@/lib/appConfig';
import { resolveBaseDirectory, resolvePdfPath } from '@/lib/pdfFinder';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
    if (!ENABLE_PDF_FINDER) {
        return NextResponse.json({ error: 'PDF finder is disabled' }, { status: 404 });
    }

    const params = request.nextUrl.searchParams;

    try {
        const resolved = await resolveBaseDirectory(params.get('dir'), getPdfFinderRoot());
        if (!resolved.ok) {
            return NextResponse.json({ error: resolved.error }, { status: 400 });
        }

        const pdfPath = resolvePdfPath(resolved.baseDir, params.get('path') ?? '');
        if (!pdfPath) {
            return NextResponse.json({ error: 'Path must point to a PDF inside the base directory' }, { status: 400 });
        }

        const contents = await readFile(pdfPath);
        const disposition = params.get('download') === '1' ? 'attachment' : 'inline';

        return new NextResponse(new Uint8Array(contents), {
            headers: {
                'Content-Type': 'application/pdf',
                'Content-Disposition': `${disposition}; filename*=UTF-8''${encodeURIComponent(path.basename(pdfPath))}`,
            },
        });
    } catch (error) {
        console.error('PDF read error:', error);
        return NextResponse.json({ error: 'Failed to read PDF file' }, { status: 500 });
    }
}
