/**
 * Console Logging Utilities
 */

// ============================================================================
// ICONS & COLOURS
// ============================================================================

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const WARNING_ICON = "⚠";

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}
