import path from "node:path";
import type { GroupBy, PersonConfig } from '../types';
import { computeAll } from '../analysis/battery.computer';
import { readPersonCsv, type PersonPaths } from '../parsers/person.loader';
import { loadPersonConfig } from '../utils/config.utils';
import { errorMessage } from '../utils/errors';
import { isFile } from '../utils/file.utils';
import {
    ASCII_LOGO,
    colorize,
    createTable,
    describePerson,
    formatNumber,
    logHeader,
    logSuccess,
    logWarning,
    showError,
    showUsage,
    withSpinner
} from './cli.utils';
import { writeResults } from './output';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export type CliOptions = {
    userId: string;
    paths: PersonPaths;
    configPath?: string;
    groupby: GroupBy;
    splitWeek: boolean;
    splitDay: boolean;
    network: boolean;
    describe: boolean;
    out?: string;
};

export type ParsedArgs =
    | { kind: 'help' }
    | { kind: 'run'; options: CliOptions }
    | { kind: 'error'; message: string };

const VALUE_FLAGS = ['--physical', '--screen', '--stops', '--places', '--attributes', '--config', '--groupby', '--out'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(arg: string): arg is ValueFlag {
    return (VALUE_FLAGS as readonly string[]).includes(arg);
}

/**
 * Parses the arguments that follow the executable and script path
 */
export function parseCliArgs(args: readonly string[]): ParsedArgs {
    if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
        return { kind: 'help' };
    }

    const positional: string[] = [];
    const values: Partial<Record<ValueFlag, string>> = {};
    const switches = new Set<string>();

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (isValueFlag(arg)) {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { kind: 'error', message: `Option ${arg} expects a value` };
            }
            values[arg] = value;
            i++;
        } else if (arg === '--split-week' || arg === '--split-day' || arg === '--network' || arg === '--describe') {
            switches.add(arg);
        } else if (arg.startsWith('--')) {
            return { kind: 'error', message: `Unknown option ${arg}` };
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 2) {
        return { kind: 'error', message: 'Expected a user id and a records directory' };
    }

    const groupby = values['--groupby'] ?? 'week';
    if (groupby !== 'week' && groupby !== 'none') {
        return { kind: 'error', message: `--groupby must be "week" or "none", got "${groupby}"` };
    }

    const out = values['--out'];
    if (out !== undefined && !/\.(json|csv)$/i.test(out)) {
        return { kind: 'error', message: `--out must name a .json or .csv file, got "${out}"` };
    }

    const [userId, records] = positional;
    return {
        kind: 'run',
        options: {
            userId,
            paths: {
                records,
                physical: values['--physical'],
                screen: values['--screen'],
                stops: values['--stops'],
                places: values['--places'],
                attributes: values['--attributes']
            },
            configPath: values['--config'],
            groupby: groupby === 'week' ? 'week' : null,
            splitWeek: switches.has('--split-week'),
            splitDay: switches.has('--split-day'),
            network: switches.has('--network'),
            describe: switches.has('--describe'),
            out
        }
    };
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function
 */
export async function runCLI(argv: string[]): Promise<void> {
    const parsed = parseCliArgs(argv.slice(2));

    if (parsed.kind === 'help') {
        showUsage();
        return;
    }
    if (parsed.kind === 'error') {
        showError(parsed.message);
        process.exitCode = 1;
        return;
    }

    const { options } = parsed;
    console.log(ASCII_LOGO);

    try {
        let config: PersonConfig | undefined;
        if (options.configPath) {
            if (!isFile(options.configPath)) {
                showError("Configuration file does not exist", `Path: ${path.resolve(options.configPath)}`);
                process.exitCode = 1;
                return;
            }
            config = loadPersonConfig(options.configPath);
        }

        // Step 1: Load the user
        logHeader("LOADING RECORDS");
        const person = readPersonCsv(options.userId, options.paths, { config, network: options.network });
        logSuccess(`Loaded ${formatNumber(person.records.length)} record(s) for ${options.userId}`);
        if (options.describe) describePerson(person);

        // Step 2: Compute the indicator battery
        logHeader("COMPUTING INDICATORS");
        const report = withSpinner("Computing indicators...", () => computeAll(person, {
            groupby: options.groupby,
            splitWeek: options.splitWeek,
            splitDay: options.splitDay
        }));

        const computed = Object.keys(report.indicators).length;
        logSuccess(`Computed ${formatNumber(computed)} indicator(s)`);
        if (report.failures.length > 0) {
            logWarning(`${report.failures.length} indicator(s) failed`);
            createTable(
                [
                    { header: 'Indicator', width: 32, align: 'left' },
                    { header: 'Error', width: 60, align: 'left' }
                ],
                report.failures.map(failure => [failure.indicator, failure.message])
            );
        }

        // Step 3: Write outputs
        if (options.out) {
            logHeader("WRITING OUTPUT");
            writeResults([report], options.out);
        } else {
            console.log(JSON.stringify(report, null, 2));
        }

        console.log();
        logSuccess("Analysis completed successfully!");
        console.log(`${colorize('Records analysed:', 'cyan')} ${formatNumber(report.reporting.numberOfRecords)}`);
    } catch (error) {
        showError("Error analysing records", errorMessage(error));
        process.exitCode = 1;
    }
}
