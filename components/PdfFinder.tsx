'use client';

import { FormEvent, useCallback, useEffect, useState } from 'react';
import { format } from 'date-fns';
import { Download, FileText, Search } from 'lucide-react';
import { PdfListing } from '@/types';
import { formatSize } from '@/lib/pdfSize';

const buildFileUrl = (baseDir: string, relativePath: string, download = false) => {
    const params = new URLSearchParams({ dir: baseDir, path: relativePath });
    if (download) params.set('download', '1');
    return `/api/pdfs/file?${params.toString()}`;
};

const isPdfListing = (value: unknown): value is PdfListing =>
    typeof value === 'object' && value !== null && 'baseDir' in value && 'files' in value && Array.isArray(value.files);

const readError = (value: unknown): string | null =>
    typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string'
        ? value.error
        : null;

export default function PdfFinder() {
    const [directory, setDirectory] = useState('');
    const [listing, setListing] = useState<PdfListing | null>(null);
    const [selected, setSelected] = useState<string>('');
    const [error, setError] = useState<string | null>(null);
    const [loading, setLoading] = useState(false);

    const scan = useCallback(async (dir: string) => {
        setLoading(true);
        setError(null);
        try {
            const params = new URLSearchParams();
            if (dir.trim()) params.set('dir', dir.trim());
            const response = await fetch(`/api/pdfs?${params.toString()}`);
            const body: unknown = await response.json();

            if (!response.ok || !isPdfListing(body)) {
                setListing(null);
                setError(readError(body) ?? 'Failed to scan directory for PDFs');
                return;
            }

            setListing(body);
            setDirectory(body.baseDir);
            setSelected(body.files[0]?.relativePath ?? '');
        } catch (err) {
            console.error('PDF scan error:', err);
            setListing(null);
            setError('Failed to scan directory for PDFs');
        } finally {
            setLoading(false);
        }
    }, []);

    useEffect(() => {
        void scan('');
    }, [scan]);

    const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
        e.preventDefault();
        void scan(directory);
    };

    return (
        <div className="space-y-6">
            <form onSubmit={handleSubmit} className="flex gap-2">
                <label htmlFor="base-directory" className="sr-only">Base directory</label>
                <input
                    id="base-directory"
                    value={directory}
                    onChange={(e) => setDirectory(e.target.value)}
                    placeholder="Absolute or relative path to scan for PDF files"
                    className="flex-1 px-4 py-2 bg-slate-900 border border-slate-700 rounded-lg font-mono text-sm text-slate-100"
                />
                <button
                    type="submit"
                    disabled={loading}
                    className="flex items-center gap-1 px-4 py-2 rounded-lg bg-cyan-600 hover:bg-cyan-500 text-white text-sm disabled:opacity-50"
                >
                    <Search className="w-4 h-4" /> Scan
                </button>
            </form>

            {error && <div role="alert" className="bg-red-950/40 border-l-4 border-red-500 p-4 text-red-200">{error}</div>}
            {loading && <p className="text-slate-400 text-sm">Scanning...</p>}

            {listing && !loading && (
                <section>
                    <h2 className="text-xl font-semibold text-white mb-1">Results</h2>
                    <p className="text-xs text-slate-500 mb-3">
                        Listing PDFs recursively under the provided base directory. Paths are shown relative to the base directory for easier reading.
                    </p>

                    {listing.files.length === 0 ? (
                        <p className="text-sky-300">No PDF files were found. Try another directory or add PDFs to scan.</p>
                    ) : (
                        <>
                            <table className="w-full text-sm text-left mb-6">
                                <thead className="text-xs uppercase text-slate-500 border-b border-slate-800">
                                    <tr>
                                        <th className="py-2">PDF</th>
                                        <th className="py-2">Size</th>
                                        <th className="py-2">Modified</th>
                                    </tr>
                                </thead>
                                <tbody className="text-slate-200">
                                    {listing.files.map(file => (
                                        <tr key={file.relativePath} className="border-b border-slate-800/60">
                                            <td className="py-1.5 flex items-center gap-2">
                                                <FileText className="w-4 h-4 text-slate-500" />
                                                {file.relativePath}
                                            </td>
                                            <td className="py-1.5 font-mono">{formatSize(file.sizeBytes)}</td>
                                            <td className="py-1.5 font-mono">{format(new Date(file.modifiedAt), 'yyyy-MM-dd HH:mm:ss')}</td>
                                        </tr>
                                    ))}
                                </tbody>
                            </table>

                            <h2 className="text-xl font-semibold text-white mb-3">Quick preview</h2>
                            <div className="flex gap-2 items-center mb-4">
                                <label htmlFor="pdf-select" className="text-sm text-slate-300">Choose a PDF to preview</label>
                                <select
                                    id="pdf-select"
                                    value={selected}
                                    onChange={(e) => setSelected(e.target.value)}
                                    className="px-3 py-1.5 bg-slate-900 border border-slate-700 rounded-lg text-sm text-slate-100"
                                >
                                    {listing.files.map(file => (
                                        <option key={file.relativePath} value={file.relativePath}>{file.relativePath}</option>
                                    ))}
                                </select>
                                {selected && (
                                    <a
                                        href={buildFileUrl(listing.baseDir, selected, true)}
                                        className="flex items-center gap-1 text-sm px-3 py-1.5 rounded-lg bg-slate-800 hover:bg-slate-700 text-slate-200"
                                    >
                                        <Download className="w-4 h-4" /> Download selected PDF
                                    </a>
                                )}
                            </div>
                            {selected && (
                                <iframe
                                    title="PDF preview"
                                    src={buildFileUrl(listing.baseDir, selected)}
                                    className="w-full h-[720px] rounded-lg border border-slate-800 bg-white"
                                />
                            )}
                        </>
                    )}
                </section>
            )}
        </div>
    );
}
