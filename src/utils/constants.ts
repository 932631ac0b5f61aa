/**
 * Constants and Configuration Values
 */

// ============================================================================
// TIME & SEGMENTATION CONFIGURATION
// ============================================================================

export const ONE_MINUTE_MS = 60_000;
export const ONE_HOUR_MS = 60 * ONE_MINUTE_MS;

// Conversations end after this much inactivity between two records
export const DEFAULT_CONVERSATION_TIMEOUT_MS = ONE_HOUR_MS;
// Physical co-presence is sampled densely, so its conversations close sooner
export const DEFAULT_PHYSICAL_TIMEOUT_MS = 5 * ONE_MINUTE_MS;

// Calls strictly longer than this (seconds) were answered and close a conversation
export const ANSWERED_CALL_THRESHOLD_SEC = 1;

// Calls at or below this (seconds) are not counted as contact
export const MIN_CONTACT_CALL_DURATION_SEC = 5;

// Two records are the same event seen from both sides if this close (seconds)
export const RECORD_MATCH_WINDOW_SEC = 30;

// Home detection bins nocturnal records into slots of this length
export const HOME_BIN_MS = 30 * ONE_MINUTE_MS;

// ============================================================================
// PERSON DEFAULTS
// ============================================================================

export const DEFAULT_NIGHT_START = '22:00';
export const EARLY_NIGHT_START = '19:00';
export const DEFAULT_NIGHT_END = '07:00';

// ISO weekdays: 1 = Monday ... 7 = Sunday
export const DEFAULT_WEEKEND = [6, 7];

// ============================================================================
// INDICATOR DEFAULTS
// ============================================================================

export const DEFAULT_PARETO_PERCENTAGE = 0.8;

// Tolerance applied before rounding a mass target up, so 15 * 0.8 stays 12
export const PARETO_TARGET_EPSILON = 1e-9;

export const EARTH_RADIUS_KM = 6371;

export const PLACE_LABELS = {
    home: 'home',
    campus: 'campus',
    other: 'other',
} as const;

// ============================================================================
// GROUPING LABELS
// ============================================================================

export const ALL_WEEKS_KEY = 'allweek';
export const WEEK_KEY_FORMAT = 'yyyy-MM-dd';
export const RECORD_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export const FLATTEN_SEPARATOR = '__';
export const DEFAULT_CSV_DIGITS = 5;
