import fs from "node:fs";
import path from "node:path";
import type { FlatReport, IndicatorReport } from '../types';
import { toCsv, toJson } from '../export/export.utils';
import { logSuccess } from '../utils/log.utils';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.floor(Math.log(bytes) / Math.log(1024));
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

/**
 * Writes results as CSV or JSON depending on the file extension
 */
export function writeResults(results: ReadonlyArray<IndicatorReport | FlatReport>, outputPath: string): void {
    const absolutePath = path.resolve(outputPath);
    if (path.extname(absolutePath).toLowerCase() === '.csv') {
        toCsv(results, absolutePath);
    } else {
        toJson(results, absolutePath);
    }
    const size = formatBytes(fs.statSync(absolutePath).size);
    logSuccess(`Successfully exported ${results.length} object(s) to ${path.basename(absolutePath)} (${size})`);
}
