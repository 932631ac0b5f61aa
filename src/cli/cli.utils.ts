/**
 * CLI Utilities for enhanced user experience
 */

import type { Person } from '../types';
import { formatRecordDatetime } from '../utils/date.utils';
import { colorize, logError } from '../utils/log.utils';

export {
    colorize,
    colors,
    logError,
    logHeader,
    logSuccess,
    logWarning
} from '../utils/log.utils';

// ============================================================================
// ASCII ART & BRANDING
// ============================================================================

export const ASCII_LOGO = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║               B E H A V I O U R   A N A L Y S E R          ║
║                                                            ║
║        Interaction, Mobility & Phone-Usage Indicators      ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

/**
 * "1 record", "0 record", "5 records": singular for zero and one
 */
export function formatCount(n: number, plural: string): string {
    return n === 0 || n === 1 ? `${n} ${plural.slice(0, -1)}` : `${n} ${plural}`;
}

// ============================================================================
// LOADING INDICATORS
// ============================================================================

export class LoadingSpinner {
    private interval: NodeJS.Timeout | null = null;
    private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    private currentFrame = 0;
    private message: string;

    constructor(message: string) {
        this.message = message;
    }

    start(): void {
        if (!process.stdout.isTTY) return;
        process.stdout.write('\x1b[?25l'); // Hide cursor
        this.interval = setInterval(() => {
            process.stdout.write(`\r${colorize(this.frames[this.currentFrame], 'cyan')} ${this.message}`);
            this.currentFrame = (this.currentFrame + 1) % this.frames.length;
        }, 100);
    }

    stop(): void {
        if (!this.interval) return;
        clearInterval(this.interval);
        this.interval = null;
        process.stdout.write('\r' + ' '.repeat(process.stdout.columns ?? 80) + '\r'); // Clear line
        process.stdout.write('\x1b[?25h'); // Show cursor
    }
}

/**
 * Runs `task` behind a spinner, stopping it even when the task throws
 */
export function withSpinner<T>(message: string, task: () => T): T {
    const spinner = new LoadingSpinner(message);
    spinner.start();
    try {
        return task();
    } finally {
        spinner.stop();
    }
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

export function formatTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    const lines = [
        `┌─${separator}─┐`,
        `│ ${colorize(headerRow, 'bright')} │`,
        `├─${separator}─┤`
    ];

    data.forEach(row => {
        const formattedRow = row.map((cell, i) => {
            const col = columns[i];
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart((col.width + truncated.length) / 2).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    });

    lines.push(`└─${separator}─┘`);
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    formatTable(columns, data).forEach(line => console.log(line));
}

// ============================================================================
// PERSON DESCRIPTION
// ============================================================================

const FILLED_BOX = '[x]';
const EMPTY_BOX = '[ ]';

/**
 * Checkbox summary of what was loaded for a person
 */
export function describePersonLines(person: Person): string[] {
    const box = (filled: boolean) => colorize(filled ? FILLED_BOX : EMPTY_BOX, 'green');
    const lines: string[] = [];
    const { records } = person;

    if (records.length === 0) {
        lines.push(`${box(false)} No records stored`);
    } else {
        const start = formatRecordDatetime(records[0].datetime);
        const end = formatRecordDatetime(records[records.length - 1].datetime);
        lines.push(`${box(true)} ${formatCount(records.length, 'records')} from ${start} to ${end}`);
        const contacts = new Set(records.flatMap(r => r.correspondentId === null ? [] : [r.correspondentId]));
        lines.push(`    ${formatCount(contacts.size, 'contacts')}`);
    }

    const places = Object.keys(person.config.places).length;
    lines.push(places > 0 ? `${box(true)} ${formatCount(places, 'places')}` : `${box(false)} No place table loaded`);

    lines.push(person.home !== null ? `${box(true)} Has home` : `${box(false)} No home`);

    const attributes = Object.keys(person.attributes).length;
    lines.push(attributes > 0 ? `${box(true)} ${formatCount(attributes, 'attributes')}` : `${box(false)} No attribute stored`);

    const network = Object.values(person.network);
    if (network.length === 0) {
        lines.push(`${box(false)} No network loaded`);
    } else {
        const loaded = network.filter(member => member !== null).length;
        lines.push(`${box(true)} ${formatCount(loaded, 'correspondents')} loaded out of ${network.length} contacts`);
    }
    return lines;
}

export function describePerson(person: Person): void {
    describePersonLines(person).forEach(line => console.log(line));
}

// ============================================================================
// USAGE HELPER
// ============================================================================

export function showUsage(): void {
    console.log(ASCII_LOGO);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('behaviour-analyser', 'cyan')} ${colorize('<user_id> <records_dir>', 'yellow')} ${colorize('[options]', 'dim')}`);
    console.log();

    console.log(`${colorize('ARGUMENTS:', 'bright')}`);
    console.log(`  ${colorize('user_id', 'yellow')}        Name of the user's file (<user_id>.csv) in each directory`);
    console.log(`  ${colorize('records_dir', 'yellow')}    Directory with call and text records`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--physical <dir>', 'cyan')}      Directory with physical proximity records`);
    console.log(`  ${colorize('--screen <dir>', 'cyan')}        Directory with screen sessions`);
    console.log(`  ${colorize('--stops <dir>', 'cyan')}         Directory with stop locations`);
    console.log(`  ${colorize('--places <file>', 'cyan')}       CSV of place_id, label, latitude, longitude`);
    console.log(`  ${colorize('--attributes <dir>', 'cyan')}    Directory with key,value attribute files`);
    console.log(`  ${colorize('--config <file>', 'cyan')}       JSON person configuration (night window, weekend, timeouts)`);
    console.log(`  ${colorize('--groupby <week|none>', 'cyan')} Group indicators by week (default) or not at all`);
    console.log(`  ${colorize('--split-week', 'cyan')}          Also report weekdays and weekends separately`);
    console.log(`  ${colorize('--split-day', 'cyan')}           Also report days and nights separately`);
    console.log(`  ${colorize('--network', 'cyan')}             Load correspondents and drop unreciprocated records`);
    console.log(`  ${colorize('--out <file>', 'cyan')}          Write results to a .json or .csv file`);
    console.log(`  ${colorize('--describe', 'cyan')}            Print a summary of the loaded user`);
    console.log(`  ${colorize('--help, -h', 'cyan')}            Show this help message`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('behaviour-analyser alice ./records --describe', 'cyan')}`);
    console.log(`  ${colorize('behaviour-analyser alice ./records --stops ./stops --split-day --out alice.csv', 'cyan')}`);
    console.log();
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}
