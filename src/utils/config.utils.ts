/**
 * Person Configuration
 */

import fs from "node:fs";
import { z } from 'zod';
import type { PersonConfig } from '../types';
import {
    DEFAULT_CONVERSATION_TIMEOUT_MS,
    DEFAULT_NIGHT_END,
    DEFAULT_NIGHT_START,
    DEFAULT_PHYSICAL_TIMEOUT_MS,
    DEFAULT_WEEKEND
} from './constants';
import { parseTimeOfDay } from './date.utils';
import { IndicatorContractError } from './errors';

// ============================================================================
// SCHEMAS
// ============================================================================

const timeOfDaySchema = z.string().refine(
    value => parseTimeOfDay(value) !== null,
    { message: 'Expected a clock time such as "22:00" or "06:30:00"' }
);

export const coordinatesSchema = z.tuple([
    z.number().min(-90).max(90),
    z.number().min(-180).max(180)
]);

export const placeSchema = z.object({
    label: z.string().min(1).optional(),
    location: coordinatesSchema.optional()
});

export const personConfigSchema = z.object({
    nightStart: timeOfDaySchema.default(DEFAULT_NIGHT_START),
    nightEnd: timeOfDaySchema.default(DEFAULT_NIGHT_END),
    weekend: z.array(z.number().int().min(1).max(7)).default(() => [...DEFAULT_WEEKEND]),
    conversationTimeoutMs: z.number().positive().default(DEFAULT_CONVERSATION_TIMEOUT_MS),
    physicalTimeoutMs: z.number().positive().default(DEFAULT_PHYSICAL_TIMEOUT_MS),
    places: z.record(placeSchema).default({})
});

export type PersonConfigInput = z.input<typeof personConfigSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Merges caller values over the defaults and validates the result
 */
export function resolvePersonConfig(input: unknown = {}): PersonConfig {
    const result = personConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new IndicatorContractError('INVALID_CONFIG', `Invalid person configuration: ${details}`);
    }
    return result.data;
}

export const DEFAULT_PERSON_CONFIG: PersonConfig = resolvePersonConfig();

/**
 * Reads a person configuration from a JSON file
 */
export function loadPersonConfig(filePath: string): PersonConfig {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return resolvePersonConfig(raw);
}

/**
 * Night window bounds in seconds since midnight
 */
export function nightWindowSeconds(config: PersonConfig): { start: number; end: number } {
    const start = parseTimeOfDay(config.nightStart);
    const end = parseTimeOfDay(config.nightEnd);
    if (start === null || end === null) {
        throw new IndicatorContractError(
            'INVALID_CONFIG',
            `Invalid night window ${config.nightStart}-${config.nightEnd}`
        );
    }
    return { start, end };
}
