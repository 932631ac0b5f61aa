/**
 * Behaviour Analyser - Main Entry Point
 *
 * Computes behavioural indicators (social, temporal, spatial and phone usage)
 * from per-user interaction and mobility records.
 *
 * Usage:
 *  npx tsx src/index.ts <user_id> <records_dir> [options]
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
    runCLI(process.argv).catch((error: unknown) => {
        console.error("✗ Unexpected error:", error);
        process.exit(1);
    });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './utils';
export * from './analysis';
export * from './parsers';
export * from './export';
export { runCLI, parseCliArgs, describePerson, describePersonLines, writeResults } from './cli';
export type { CliOptions, ParsedArgs } from './cli';
