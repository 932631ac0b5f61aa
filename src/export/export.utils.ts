/**
 * Report Export Utilities
 */

import fs from "node:fs";
import path from "node:path";
import type { FlatReport, IndicatorReport } from '../types';
import { DEFAULT_CSV_DIGITS, FLATTEN_SEPARATOR } from '../utils/constants';

// ============================================================================
// FLATTENING
// ============================================================================

type FlatValue = FlatReport[string];

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function toFlatValue(value: unknown): FlatValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(item => String(item)).join(',');
    return String(value);
}

/**
 * Flattens nested objects into one level, joining keys with the separator.
 * Arrays become comma-separated strings and missing values null.
 */
export function flatten(object: Record<string, unknown>, separator = FLATTEN_SEPARATOR, prefix = ''): FlatReport {
    const flat: FlatReport = {};
    for (const [key, value] of Object.entries(object)) {
        const flatKey = prefix ? `${prefix}${separator}${key}` : key;
        if (isPlainObject(value)) {
            Object.assign(flat, flatten(value, separator, flatKey));
        } else {
            flat[flatKey] = toFlatValue(value);
        }
    }
    return flat;
}

/**
 * One flat row per person: name, reporting variables, indicators at the top
 * level, then attributes
 */
export function flattenReport(report: IndicatorReport, separator = FLATTEN_SEPARATOR): FlatReport {
    return flatten({
        name: report.name,
        reporting: report.reporting,
        ...report.indicators,
        attributes: report.attributes
    }, separator);
}

function isIndicatorReport(result: IndicatorReport | FlatReport): result is IndicatorReport {
    return typeof result.reporting === 'object' && result.reporting !== null;
}

function toFlat(result: IndicatorReport | FlatReport): FlatReport {
    return isIndicatorReport(result) ? flattenReport(result) : result;
}

// ============================================================================
// CSV
// ============================================================================

function formatCell(value: FlatValue, digits: number): string {
    if (value === null) return '';
    if (typeof value === 'number') {
        return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(digits)));
    }
    const text = String(value);
    return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * CSV text with one row per result. Columns are the union of all keys in the
 * order they are first seen; absent values are empty cells.
 */
export function formatCsv(results: ReadonlyArray<IndicatorReport | FlatReport>, digits = DEFAULT_CSV_DIGITS): string {
    const rows = results.map(toFlat);
    const columns: string[] = [];
    const known = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            if (!known.has(key)) {
                known.add(key);
                columns.push(key);
            }
        }
    }

    const lines = [columns.map(c => formatCell(c, digits)).join(',')];
    for (const row of rows) {
        lines.push(columns.map(c => formatCell(row[c] ?? null, digits)).join(','));
    }
    return lines.join('\n') + '\n';
}

export function toCsv(results: ReadonlyArray<IndicatorReport | FlatReport>, filePath: string, digits = DEFAULT_CSV_DIGITS): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatCsv(results, digits), "utf8");
}

// ============================================================================
// JSON
// ============================================================================

/**
 * JSON object keyed by each result's name
 */
export function formatJson(results: ReadonlyArray<IndicatorReport | FlatReport>): string {
    const byName: Record<string, IndicatorReport | FlatReport> = {};
    for (const result of results) {
        byName[String(result.name)] = result;
    }
    return JSON.stringify(byName, null, 2);
}

export function toJson(results: ReadonlyArray<IndicatorReport | FlatReport>, filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatJson(results), "utf8");
}
