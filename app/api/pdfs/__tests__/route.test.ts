// @vitest-environment node
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { NextRequest } from 'next/server';
import { GET as listPdfs } from '../route';
import { GET as readPdf } from '../file/route';

const PDF_BODY = '%PDF-1.4 route fixture';

let baseDir: string;

const request = (pathname: string, params: Record<string, string>) =>
    new NextRequest(`http://localhost${pathname}?${new URLSearchParams(params).toString()}`);

beforeAll(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'pdf-route-'));
    await writeFile(path.join(baseDir, 'report.pdf'), PDF_BODY);
    await writeFile(path.join(baseDir, 'Prüfbericht März.pdf'), PDF_BODY);
    await writeFile(path.join(baseDir, 'readme.txt'), 'text');
    vi.stubEnv('PDF_FINDER_ROOT', baseDir);
});

afterAll(async () => {
    vi.unstubAllEnvs();
    await rm(baseDir, { recursive: true, force: true });
});

describe('GET /api/pdfs', () => {
    it('lists PDFs under the configured root', async () => {
        const response = await listPdfs(request('/api/pdfs', {}));
        const body = await response.json();

        expect(response.status).toBe(200);
        expect(body.baseDir).toBe(baseDir);
        expect(body.files.map((file: { relativePath: string }) => file.relativePath)).toEqual([
            'Prüfbericht März.pdf',
            'report.pdf',
        ]);
        expect(body.files[1]).toMatchObject({ relativePath: 'report.pdf', sizeBytes: Buffer.byteLength(PDF_BODY) });
    });

    it('answers 400 for a missing directory', async () => {
        const response = await listPdfs(request('/api/pdfs', { dir: 'nope' }));

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
            error: 'The provided directory does not exist. Update the path and try again.',
        });
    });
});

describe('GET /api/pdfs/file', () => {
    it('streams the PDF inline', async () => {
        const response = await readPdf(request('/api/pdfs/file', { path: 'report.pdf' }));

        expect(response.status).toBe(200);
        expect(response.headers.get('Content-Type')).toBe('application/pdf');
        expect(response.headers.get('Content-Disposition')).toBe("inline; filename*=UTF-8''report.pdf");
        expect(await response.text()).toBe(PDF_BODY);
    });

    it('marks downloads as attachments', async () => {
        const response = await readPdf(request('/api/pdfs/file', { path: 'report.pdf', download: '1' }));
        expect(response.headers.get('Content-Disposition')).toBe("attachment; filename*=UTF-8''report.pdf");
    });

    it('percent-encodes non-ASCII and spaced file names', async () => {
        const response = await readPdf(request('/api/pdfs/file', { path: 'Prüfbericht März.pdf', download: '1' }));

        expect(response.headers.get('Content-Disposition')).toBe(
            "attachment; filename*=UTF-8''Pr%C3%BCfbericht%20M%C3%A4rz.pdf",
        );
    });

    it('refuses files that are not PDFs or escape the base directory', async () => {
        const notPdf = await readPdf(request('/api/pdfs/file', { path: 'readme.txt' }));
        const escaping = await readPdf(request('/api/pdfs/file', { path: '../report.pdf' }));

        expect(notPdf.status).toBe(400);
        expect(escaping.status).toBe(400);
        expect(await escaping.json()).toEqual({ error: 'Path must point to a PDF inside the base directory' });
    });
});
