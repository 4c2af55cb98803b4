const SIZE_STEP = 1024;
const SIZE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

/** Binary-unit file size: whole bytes, one decimal from KiB up. */
export const formatSize = (numBytes: number): string => {
    let size = numBytes;
    for (const unit of SIZE_UNITS) {
        if (size < SIZE_STEP) {
            return unit === 'B' ? `${Math.trunc(size)} ${unit}` : `${size.toFixed(1)} ${unit}`;
        }
        size /= SIZE_STEP;
    }
    return `${size.toFixed(1)} PiB`;
};
