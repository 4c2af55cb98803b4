const envFlag = (value: string | undefined, defaultValue: boolean): boolean => {
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return defaultValue;
};

const envNumber = (value: string | undefined, defaultValue: number, min: number, max: number): number => {
    if (value === undefined || value.trim() === '') return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) return defaultValue;
    return Math.min(max, Math.max(min, parsed));
};

export { envFlag, envNumber };

// Kill switch: set NEXT_PUBLIC_ENABLE_PDF_FINDER=false to hide the PDF finder page and routes.
export const ENABLE_PDF_FINDER = envFlag(process.env.NEXT_PUBLIC_ENABLE_PDF_FINDER, true);

export const DEFAULT_DAILY_CAPACITY = envNumber(process.env.NEXT_PUBLIC_DEFAULT_DAILY_CAPACITY, 6, 1, 12);

/** Server-only: where the PDF finder starts scanning. */
export const getPdfFinderRoot = (): string => process.env.PDF_FINDER_ROOT || process.cwd();
