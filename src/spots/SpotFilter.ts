import { normalizeBand } from '../awards/AwardTracker';
import type { ClassifiedSpot } from './types';

export interface SpotFilterOptions {
    bands?: string[];           // Empty or missing means every band
    grid?: string;              // Grid prefix, e.g. "FN" or "FN31"
    entityPrefix?: string;      // Substring of the cluster's entity prefix
    neededOnly?: boolean;
    blockedSpotters?: string[];
    blockedPrefixes?: string[];
}

export type SpotPredicate = (entry: ClassifiedSpot) => boolean;

/** "EA8/DL1ABC" -> "EA8", "K1ABC" -> "K1ABC". */
export function callPrefix(callsign: string): string {
    const head = callsign.toUpperCase().split('/')[0];
    const match = /^[A-Z0-9]+/.exec(head);
    return match ? match[0] : '';
}

/** Skimmer spotters report as "CALL-#"; "W3LPL-2" also matches a block on "W3LPL". */
export function isBlockedSpotter(spotter: string, blocked: ReadonlySet<string>): boolean {
    if (blocked.size === 0) return false;
    const call = spotter.trim().toUpperCase();
    return blocked.has(call) || blocked.has(call.split('-')[0]);
}

function upperSet(values: string[] | undefined): Set<string> {
    return new Set((values ?? []).map(value => value.trim().toUpperCase()).filter(Boolean));
}

export function buildSpotFilter(options: SpotFilterOptions = {}): SpotPredicate {
    const bands = new Set((options.bands ?? []).map(normalizeBand).filter(Boolean));
    const grid = (options.grid ?? '').trim().toUpperCase();
    const entityPrefix = (options.entityPrefix ?? '').trim().toUpperCase();
    const neededOnly = options.neededOnly ?? false;
    const blockedSpotters = upperSet(options.blockedSpotters);
    const blockedPrefixes = upperSet(options.blockedPrefixes);

    return ({ spot, neededMultiBand, neededGrid }) => {
        if (bands.size > 0 && !bands.has(normalizeBand(spot.band))) return false;
        if (grid && !spot.grid.toUpperCase().startsWith(grid)) return false;
        if (entityPrefix && !spot.prefix.toUpperCase().includes(entityPrefix)) return false;
        if (neededOnly && !neededMultiBand && !neededGrid) return false;
        if (isBlockedSpotter(spot.spotter, blockedSpotters)) return false;
        if (blockedPrefixes.size > 0 && blockedPrefixes.has(callPrefix(spot.callsign))) return false;
        return true;
    };
}
