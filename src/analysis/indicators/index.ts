import type { IndicatorDescriptor } from '../../types';
import {
    activeDays,
    balanceOfContacts,
    balanceOfInteractions,
    entropyOfContacts,
    interactionsPerContact,
    numberOfContacts,
    numberOfInteractions,
    percentContactsLess,
    percentInitiatedInteractions,
    percentParetoDurations,
    percentParetoInteractions
} from './social.indicators';
import {
    duration,
    firstSeenResponseRate,
    percentConcludedConversations,
    percentInitiatedConversations,
    responseDelay,
    responseRate
} from './conversation.indicators';
import { intereventTime, percentNocturnal } from './temporal.indicators';
import { overlapConversations, overlapScreenPhysical } from './overlap.indicators';
import {
    numberOfPlaces,
    percentAtCampus,
    percentAtHome,
    percentAtPlace,
    percentInteractionsAtPlace,
    percentOutsideFromPlace,
    radiusOfGyration
} from './spatial.indicators';

export * from './social.indicators';
export * from './conversation.indicators';
export * from './temporal.indicators';
export * from './overlap.indicators';
export * from './spatial.indicators';
export { defineIndicator, paretoFraction, ratio, ALL_KINDS } from './indicator.utils';

/**
 * Every registered indicator, in the order the battery reports them
 */
export const INDICATORS: readonly IndicatorDescriptor[] = [
    activeDays,
    numberOfContacts,
    numberOfInteractions,
    entropyOfContacts,
    interactionsPerContact,
    balanceOfInteractions,
    balanceOfContacts,
    percentInitiatedInteractions,
    percentParetoInteractions,
    percentParetoDurations,
    percentContactsLess,
    responseRate,
    responseDelay,
    percentInitiatedConversations,
    percentConcludedConversations,
    duration,
    firstSeenResponseRate,
    percentNocturnal,
    intereventTime,
    overlapConversations,
    overlapScreenPhysical,
    numberOfPlaces,
    radiusOfGyration,
    percentAtPlace,
    percentAtHome,
    percentAtCampus,
    percentInteractionsAtPlace,
    percentOutsideFromPlace
];
