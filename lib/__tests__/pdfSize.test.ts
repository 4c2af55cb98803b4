import { describe, expect, it } from 'vitest';
import { formatSize } from '../pdfSize';

describe('formatSize', () => {
    it('shows whole bytes below one KiB', () => {
        expect(formatSize(0)).toBe('0 B');
        expect(formatSize(512)).toBe('512 B');
    });

    it('uses one decimal for larger units', () => {
        expect(formatSize(1024)).toBe('1.0 KiB');
        expect(formatSize(1536)).toBe('1.5 KiB');
        expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MiB');
        expect(formatSize(3 * 1024 ** 4)).toBe('3.0 TiB');
    });

    it('falls through to PiB', () => {
        expect(formatSize(1024 ** 5)).toBe('1.0 PiB');
    });
});
