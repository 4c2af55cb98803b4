import { readdir, stat } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PdfEntry } from '@/types';

export type ResolvedDirectory =
    | { ok: true; baseDir: string }
    | { ok: false; error: string };

const expandHome = (input: string): string => {
    if (input === '~') return os.homedir();
    if (input.startsWith('~/')) return path.join(os.homedir(), input.slice(2));
    return input;
};

export const resolveBaseDirectory = async (input: string | null, root: string): Promise<ResolvedDirectory> => {
    const requested = input?.trim() ? expandHome(input.trim()) : root;
    const baseDir = path.resolve(root, requested);

    try {
        const info = await stat(baseDir);
        if (!info.isDirectory()) {
            return { ok: false, error: 'The provided path points to a file. Please enter a directory path instead.' };
        }
    } catch (error) {
        if (isMissingPathError(error)) {
            return { ok: false, error: 'The provided directory does not exist. Update the path and try again.' };
        }
        throw error;
    }

    return { ok: true, baseDir };
};

const isMissingPathError = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

/**
 * Recursively collect every `.pdf` file (any case) under `baseDir`, sorted by
 * relative path. Symlinks count when their target is a regular file; broken
 * links and links to directories are skipped.
 */
export const findPdfs = async (baseDir: string): Promise<PdfEntry[]> => {
    const entries = await readdir(baseDir, { recursive: true, withFileTypes: true });
    const candidates = entries
        .filter(entry => (entry.isFile() || entry.isSymbolicLink()) && path.extname(entry.name).toLowerCase() === '.pdf')
        .map(entry => path.join(entry.parentPath, entry.name))
        .sort();

    const found = await Promise.all(
        candidates.map(async (fullPath): Promise<PdfEntry | null> => {
            const info = await statIfPresent(fullPath);
            if (!info?.isFile()) return null;
            return {
                relativePath: path.relative(baseDir, fullPath),
                sizeBytes: info.size,
                modifiedAt: info.mtime.toISOString(),
            };
        })
    );

    return found.filter((entry): entry is PdfEntry => entry !== null);
};

const statIfPresent = async (fullPath: string) => {
    try {
        return await stat(fullPath);
    } catch (error) {
        if (isMissingPathError(error)) return null;
        throw error;
    }
};

/**
 * Resolve a listed PDF back to an absolute path, refusing anything that
 * escapes `baseDir` or is not a PDF.
 */
export const resolvePdfPath = (baseDir: string, relativePath: string): string | null => {
    const fullPath = path.resolve(baseDir, relativePath);
    const rel = path.relative(baseDir, fullPath);
    if (!rel || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
    if (path.extname(fullPath).toLowerCase() !== '.pdf') return null;
    return fullPath;
};
