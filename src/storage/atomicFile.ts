import { promises as fs } from 'fs';
import * as path from 'path';
import { PersistenceError, errorMessage } from '../exchange/errors';
import logger from '../utils/logger';

// fs errors are not always `instanceof Error` (Jest runs tests in a separate
// realm), so match on the errno code alone.
function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON file. Resolves null when the file does not exist.
 *
 * @throws PersistenceError on unreadable or malformed content
 */
export async function readJsonFile(file: string): Promise<unknown> {
    let content: string;
    try {
        content = await fs.readFile(file, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) return null;
        throw new PersistenceError(`Failed to read ${file}: ${errorMessage(error)}`, file);
    }

    try {
        return JSON.parse(content);
    } catch (error) {
        throw new PersistenceError(`Malformed JSON in ${file}: ${errorMessage(error)}`, file);
    }
}

/**
 * Write JSON to a sibling temp file, then rename over the target.
 * Readers see either the old document or the new one, never a torn write.
 *
 * @throws PersistenceError
 */
export async function writeJsonAtomic(file: string, document: unknown): Promise<void> {
    const tempFile = `${file}.${process.pid}.tmp`;
    try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(tempFile, JSON.stringify(document, null, 2), 'utf8');
        await fs.rename(tempFile, file);
    } catch (error) {
        await fs.rm(tempFile, { force: true }).catch(cleanupError => {
            logger.warn(`[STORAGE] Could not remove temp file ${tempFile}: ${errorMessage(cleanupError)}`);
        });
        throw new PersistenceError(`Failed to write ${file}: ${errorMessage(error)}`, file);
    }
}
