import type { Coordinates, EventRecord, PersonConfig } from '../../types';
import { EARTH_RADIUS_KM, PLACE_LABELS } from '../../utils/constants';
import { resolvePlace } from '../record.factory';
import { defineIndicator, ratio } from './indicator.utils';

// ============================================================================
// GEOMETRY
// ============================================================================

const toRadians = (degrees: number) => degrees * Math.PI / 180;

/**
 * Great-circle distance in kilometres
 */
export function greatCircleDistance([lat1, lon1]: Coordinates, [lat2, lon2]: Coordinates): number {
    const dLat = toRadians(lat2 - lat1);
    const dLon = toRadians(lon2 - lon1);
    const a = Math.sin(dLat / 2) ** 2
        + Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

/**
 * Walks a mixed stop/interaction stream and pairs every non-stop record with
 * the label of the stop it happens during, or null outside any stop
 */
function labelDuringStops(records: readonly EventRecord[], person: PersonConfig): Array<[EventRecord, string | null]> {
    const paired: Array<[EventRecord, string | null]> = [];
    let label: string | null = null;
    let stopEnd = 0;

    for (const r of records) {
        const t = r.datetime.getTime();
        if (r.interaction === 'stop') {
            label = resolvePlace(r, person.places).label;
            stopEnd = t + (r.duration ?? 0) * 1000;
            continue;
        }
        paired.push([r, t < stopEnd ? label : null]);
    }
    return paired;
}

// ============================================================================
// PLACES
// ============================================================================

export const numberOfPlaces = defineIndicator({
    name: 'number_of_places',
    description: 'Number of distinct places visited',
    interactions: ['stop'],
    accepts: ['stop'],
    needsPerson: false,
    defaults: {},
    compute(records) {
        return new Set(records.map(r => r.groupingKey)).size;
    }
});

/**
 * Root mean square distance of the visited places to their centre of mass
 */
export const radiusOfGyration = defineIndicator({
    name: 'radius_of_gyration',
    description: 'Radius of gyration of visited places, in kilometres',
    interactions: ['stop'],
    accepts: ['stop'],
    needsPerson: false,
    defaults: {},
    compute(records, _params, person) {
        const points: Coordinates[] = [];
        for (const r of records) {
            const { location } = resolvePlace(r, person.places);
            if (location) points.push(location);
        }
        if (points.length === 0) return null;

        const center: Coordinates = [
            points.reduce((s, [lat]) => s + lat, 0) / points.length,
            points.reduce((s, [, lon]) => s + lon, 0) / points.length
        ];
        const squared = points.reduce((s, p) => s + greatCircleDistance(p, center) ** 2, 0);
        return Math.sqrt(squared / points.length);
    }
});

type PlaceParams = { place: string };

export const percentAtPlace = defineIndicator<PlaceParams, number | null>({
    name: 'percent_at_place',
    description: 'Share of stop time spent at places with a given label',
    interactions: ['stop'],
    accepts: ['stop'],
    needsPerson: false,
    defaults: { place: PLACE_LABELS.home },
    compute(records, { place }, person) {
        let atPlace = 0;
        let total = 0;
        for (const r of records) {
            const dwell = r.duration ?? 0;
            if (resolvePlace(r, person.places).label === place) atPlace += dwell;
            total += dwell;
        }
        return ratio(atPlace, total);
    }
});

export const percentAtHome = defineIndicator<PlaceParams, number | null>({
    ...percentAtPlace,
    name: 'percent_at_home',
    description: 'Share of stop time spent at home',
    defaults: { place: PLACE_LABELS.home }
});

export const percentAtCampus = defineIndicator<PlaceParams, number | null>({
    ...percentAtPlace,
    name: 'percent_at_campus',
    description: 'Share of stop time spent on campus',
    defaults: { place: PLACE_LABELS.campus }
});

// ============================================================================
// INTERACTIONS BY PLACE
// ============================================================================

/**
 * Among interactions that happen during some stop, the share whose stop
 * carries the given label
 */
export const percentInteractionsAtPlace = defineIndicator<PlaceParams, number | null>({
    name: 'percent_interactions_at_place',
    description: 'Share of interactions happening at places with a given label',
    interactions: [['physical', 'stop']],
    accepts: ['call', 'text', 'physical', 'stop'],
    requireAllKinds: true,
    needsPerson: false,
    defaults: { place: PLACE_LABELS.campus },
    compute(records, { place }, person) {
        const located = labelDuringStops(records, person).filter(([, label]) => label !== null);
        return ratio(located.filter(([, label]) => label === place).length, located.length);
    }
});

/**
 * Of the contacts met at `outside`, the share also met at `place`. With no
 * contact met outside, 1 when some were met at `place` and no data otherwise.
 */
export const percentOutsideFromPlace = defineIndicator<PlaceParams & { outside: string }, number | null>({
    name: 'percent_outside_from_place',
    description: 'Share of contacts met elsewhere who were also met at places with a given label',
    interactions: [['physical', 'stop']],
    accepts: ['call', 'text', 'physical', 'stop'],
    requireAllKinds: true,
    needsPerson: false,
    defaults: { place: PLACE_LABELS.campus, outside: PLACE_LABELS.other },
    compute(records, { place, outside }, person) {
        const atPlace = new Set<string>();
        const atOutside = new Set<string>();
        for (const [r, label] of labelDuringStops(records, person)) {
            if (label === place) atPlace.add(r.groupingKey);
            if (label === outside) atOutside.add(r.groupingKey);
        }

        if (atOutside.size === 0) {
            return atPlace.size === 0 ? null : 1;
        }
        const both = Array.from(atOutside).filter(contact => atPlace.has(contact)).length;
        return both / atOutside.size;
    }
});
