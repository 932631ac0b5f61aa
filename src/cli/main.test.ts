import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Person } from '../types';
import { resolvePersonConfig } from '../utils/config.utils';
import { EMPTY_OUT_OF_NETWORK } from '../parsers/person.loader';
import { at, call, text } from '../testing/record.builders';
import { colorize, describePersonLines, formatCount, formatTable, withSpinner } from './cli.utils';
import { parseCliArgs } from './main';

describe('parseCliArgs', () => {
    it('shows help without arguments', () => {
        expect(parseCliArgs([])).toEqual({ kind: 'help' });
        expect(parseCliArgs(['u1', 'records', '--help'])).toEqual({ kind: 'help' });
    });

    it('reads positionals, options and switches', () => {
        expect(parseCliArgs(['u1', 'data/records', '--groupby', 'none', '--split-day', '--stops', 'data/stops', '--out', 'out.csv'])).toEqual({
            kind: 'run',
            options: {
                userId: 'u1',
                paths: {
                    records: 'data/records',
                    physical: undefined,
                    screen: undefined,
                    stops: 'data/stops',
                    places: undefined,
                    attributes: undefined
                },
                configPath: undefined,
                groupby: null,
                splitWeek: false,
                splitDay: true,
                network: false,
                describe: false,
                out: 'out.csv'
            }
        });
    });

    it('groups by week unless told otherwise', () => {
        const parsed = parseCliArgs(['u1', 'records', '--network']);
        expect(parsed.kind === 'run' && parsed.options.groupby).toBe('week');
        expect(parsed.kind === 'run' && parsed.options.network).toBe(true);
    });

    it('reports malformed command lines', () => {
        expect(parseCliArgs(['u1'])).toEqual({ kind: 'error', message: 'Expected a user id and a records directory' });
        expect(parseCliArgs(['u1', 'r', '--groupby', 'month'])).toEqual({ kind: 'error', message: '--groupby must be "week" or "none", got "month"' });
        expect(parseCliArgs(['u1', 'r', '--out', 'x.txt'])).toEqual({ kind: 'error', message: '--out must name a .json or .csv file, got "x.txt"' });
        expect(parseCliArgs(['u1', 'r', '--bogus'])).toEqual({ kind: 'error', message: 'Unknown option --bogus' });
        expect(parseCliArgs(['u1', 'r', '--config'])).toEqual({ kind: 'error', message: 'Option --config expects a value' });
    });
});

describe('describePersonLines', () => {
    const filled = colorize('[x]', 'green');
    const empty = colorize('[ ]', 'green');

    it('summarizes what was loaded', () => {
        const person: Person = {
            name: 'u1',
            records: [text('a', 'in', at(6, 10)), call('b', 'out', at(13, 13), 60)],
            config: resolvePersonConfig({ places: { p1: { label: 'home' } } }),
            attributes: {},
            home: 'p1',
            network: { b: null },
            ignored: {},
            outOfNetwork: EMPTY_OUT_OF_NETWORK
        };
        expect(describePersonLines(person)).toEqual([
            `${filled} 2 records from 2014-01-06 10:00:00 to 2014-01-13 13:00:00`,
            '    2 contacts',
            `${filled} 1 place`,
            `${filled} Has home`,
            `${empty} No attribute stored`,
            `${filled} 0 correspondent loaded out of 1 contacts`
        ]);
    });
});

describe('formatting helpers', () => {
    it('uses the singular for zero and one', () => {
        expect(formatCount(0, 'records')).toBe('0 record');
        expect(formatCount(3, 'records')).toBe('3 records');
    });

    it('pads and truncates table cells', () => {
        const lines = formatTable([{ header: 'Name', width: 6 }, { header: 'N', width: 3, align: 'right' }], [['indicator', '7']]);
        expect(lines[3]).toBe('│ ind... │   7 │');
        expect(lines).toHaveLength(5);
    });
});

describe('withSpinner', () => {
    const wasTTY = process.stdout.isTTY;

    afterEach(() => {
        process.stdout.isTTY = wasTTY;
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('stops the spinner when the task throws', () => {
        process.stdout.isTTY = true;
        vi.useFakeTimers();
        const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

        expect(() => withSpinner('Working...', () => {
            expect(vi.getTimerCount()).toBe(1);
            throw new Error('boom');
        })).toThrow('boom');

        expect(vi.getTimerCount()).toBe(0);
        expect(write).toHaveBeenLastCalledWith('\x1b[?25h');
    });

    it('returns the value of the task', () => {
        expect(withSpinner('Working...', () => 42)).toBe(42);
    });
});
