/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import * as iconv from 'iconv-lite';

// ============================================================================
// FILE READING
// ============================================================================

/**
 * Reads a text file in the given encoding, dropping a leading byte order mark
 */
export function readTextFile(filePath: string, encoding = 'utf8'): string {
    if (!iconv.encodingExists(encoding)) {
        throw new Error(`Unsupported file encoding "${encoding}"`);
    }
    const buffer = fs.readFileSync(filePath);
    return iconv.decode(buffer, encoding, { stripBOM: true });
}

/**
 * Path of a user's file inside a per-source directory, e.g. records/alice.csv
 */
export function userFilePath(directory: string, userId: string, extension = '.csv'): string {
    return path.join(directory, `${userId}${extension}`);
}

export function isFile(filePath: string): boolean {
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

/**
 * Reads a user's file from a source directory, or returns null when the
 * directory holds no file for that user
 */
export function readUserFile(directory: string, userId: string, encoding = 'utf8'): string | null {
    const filePath = userFilePath(directory, userId);
    return isFile(filePath) ? readTextFile(filePath, encoding) : null;
}
