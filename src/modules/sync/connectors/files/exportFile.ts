import fs from 'node:fs';
import {FileImportError} from '../../../lib/errors';

/**
 * Modification time of a file, or null when it cannot be determined.
 */
export async function fileModifiedAt(filePath: string): Promise<Date | null> {
    try {
        const stat = await fs.promises.stat(filePath);
        return stat.mtime;
    } catch {
        return null;
    }
}

/**
 * Read a whole export file as UTF-8 text.
 */
export async function readExportFile(filePath: string): Promise<string> {
    try {
        return await fs.promises.readFile(filePath, 'utf8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            throw new FileImportError(`File not found: ${filePath}`, filePath);
        }
        throw new FileImportError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, filePath);
    }
}

/** A cell that may come through as text or number; blank becomes null. */
export function cellText(value: string | number | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text ? text : null;
}
