import fs from 'fs/promises';
import { z } from 'zod';
import { parseCountryFile } from './CountryFile';
import type { EntityRecord } from './CountryFile';
import { describeError } from '../util/abort';

// Country names in the country file that the award table spells differently.
// Keyed by entity number; applied only when the number exists in the table.
export const ENTITY_NAME_OVERRIDES: Readonly<Record<string, readonly string[]>> = {
    '291': ['United States'],
    '110': ['Hawaii'],
    '6': ['Alaska'],
    '248': ['Italy', 'Sicily'],
    '223': ['England'],
    '279': ['Scotland'],
    '294': ['Wales'],
    '265': ['Northern Ireland'],
    '105': ['Guantanamo Bay'],
    '202': ['Puerto Rico'],
    '285': ['US Virgin Islands', 'Virgin Islands'],
    '54': ['European Russia'],
    '15': ['Asiatic Russia'],
    '126': ['Kaliningrad'],
};

export const FUZZY_MATCH_THRESHOLD = 0.6;

// dxcc_mapping.json: { "291": "UNITED STATES OF AMERICA", ... }
export const EntityNamesFileSchema = z.record(z.string()).transform(names => {
    const trimmed: Record<string, string> = {};
    for (const [id, name] of Object.entries(names)) {
        trimmed[id.trim()] = name;
    }
    return trimmed;
});

interface ResolverSnapshot {
    readonly prefixes: ReadonlyMap<string, string>;        // prefix -> country name
    readonly exactCalls: ReadonlyMap<string, string>;      // whole callsign -> country name
    readonly countryToEntity: ReadonlyMap<string, string>; // country name -> entity id
    readonly entities: ReadonlyMap<string, EntityRecord>;  // country name -> record
    readonly entityNames: Readonly<Record<string, string>>;
}

const EMPTY_SNAPSHOT: ResolverSnapshot = {
    prefixes: new Map(),
    exactCalls: new Map(),
    countryToEntity: new Map(),
    entities: new Map(),
    entityNames: {},
};

export interface ResolverStats {
    loaded: boolean;
    prefixes: number;
    exactCalls: number;
    countries: number;
    mappedCountries: number;
}

export function normalizeCountryName(name: string): string {
    return name
        .toUpperCase()
        .replace(/\([^)]*\)/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

function significantWords(name: string): Set<string> {
    return new Set(
        normalizeCountryName(name)
            .split(' ')
            .filter(word => word.length > 2)
    );
}

/**
 * Share of significant words (longer than two characters) the two names have
 * in common, measured against the larger of the two word sets.
 */
export function tokenOverlapRatio(a: string, b: string): number {
    const wordsA = significantWords(a);
    const wordsB = significantWords(b);
    if (wordsA.size === 0 || wordsB.size === 0) return 0;

    let shared = 0;
    for (const word of wordsA) {
        if (wordsB.has(word)) shared++;
    }
    return shared / Math.max(wordsA.size, wordsB.size);
}

/**
 * Best fuzzy candidate for `name` among `candidates` (id -> name), or null
 * when none reaches the threshold. The first candidate wins a tie.
 */
export function fuzzyMatchCountry(name: string, candidates: Readonly<Record<string, string>>): string | null {
    let bestId: string | null = null;
    let bestRatio = 0;

    for (const [id, candidate] of Object.entries(candidates)) {
        const ratio = tokenOverlapRatio(name, candidate);
        if (ratio >= FUZZY_MATCH_THRESHOLD && ratio > bestRatio) {
            bestId = id;
            bestRatio = ratio;
        }
    }
    return bestId;
}

/**
 * Map every country name used by the country file to an entity id from the
 * award table: manual override first, then exact normalized name, then the
 * fuzzy word-overlap match. Countries with no match are left out.
 */
export function buildCountryIndex(
    countries: Iterable<string>,
    entityNames: Readonly<Record<string, string>>
): Map<string, string> {
    const byOverride = new Map<string, string>();
    for (const [id, names] of Object.entries(ENTITY_NAME_OVERRIDES)) {
        if (!(id in entityNames)) continue;
        for (const name of names) {
            byOverride.set(normalizeCountryName(name), id);
        }
    }

    const byName = new Map<string, string>();
    for (const [id, name] of Object.entries(entityNames)) {
        const key = normalizeCountryName(name);
        if (!byName.has(key)) {
            byName.set(key, id);
        }
    }

    const index = new Map<string, string>();
    for (const country of countries) {
        const key = normalizeCountryName(country);
        const id = byOverride.get(key) ?? byName.get(key) ?? fuzzyMatchCountry(country, entityNames);
        if (id !== null && id !== undefined) {
            index.set(country, id);
        }
    }
    return index;
}

/**
 * Resolves cluster prefixes (e.g. "IT9") to award entity ids (e.g. "248").
 *
 * Lookups run against an immutable snapshot; `initialize()` builds a new one
 * and swaps it in whole. Without data every lookup answers null.
 */
export class EntityResolver {
    private snapshot: ResolverSnapshot = EMPTY_SNAPSHOT;

    public initialize(countryFileText: string | null, entityNames: Record<string, string> | null): boolean {
        if (countryFileText === null || entityNames === null) {
            this.snapshot = EMPTY_SNAPSHOT;
            return false;
        }

        const countryFile = parseCountryFile(countryFileText);
        const countries = new Set([...countryFile.prefixes.values(), ...countryFile.exactCalls.values()]);

        const entities = new Map<string, EntityRecord>();
        for (const entity of countryFile.entities) {
            entities.set(entity.name, entity);
        }

        const next: ResolverSnapshot = {
            prefixes: countryFile.prefixes,
            exactCalls: countryFile.exactCalls,
            countryToEntity: buildCountryIndex(countries, entityNames),
            entities,
            entityNames: { ...entityNames },
        };

        if (next.prefixes.size + next.exactCalls.size === 0 || next.countryToEntity.size === 0) {
            this.snapshot = EMPTY_SNAPSHOT;
            return false;
        }

        this.snapshot = next;
        return true;
    }

    /**
     * Read the country file and the entity-number table from disk. A missing
     * or unreadable file leaves the resolver empty and returns false.
     */
    public async loadFromFiles(countryFilePath: string, entityNamesPath: string): Promise<boolean> {
        let countryText: string | null = null;
        let entityNames: Record<string, string> | null = null;

        try {
            countryText = await fs.readFile(countryFilePath, 'utf-8');
        } catch (error) {
            console.warn(`Country file not available (${countryFilePath}): ${describeError(error)}`);
        }

        try {
            const result = EntityNamesFileSchema.safeParse(JSON.parse(await fs.readFile(entityNamesPath, 'utf-8')));
            if (result.success) {
                entityNames = result.data;
            } else {
                const issue = result.error.issues[0];
                console.warn(`Entity name table ignored (${entityNamesPath}): ${issue.path.join('.') || '(root)'}: ${issue.message}`);
            }
        } catch (error) {
            console.warn(`Entity name table not available (${entityNamesPath}): ${describeError(error)}`);
        }

        const ok = this.initialize(countryText, entityNames);
        const stats = this.getStats();
        if (ok) {
            console.log(`DXCC lookup ready: ${stats.prefixes} prefixes, ${stats.mappedCountries}/${stats.countries} countries mapped`);
        } else {
            console.warn('DXCC lookup unavailable, spots will not be checked for the Challenge');
        }
        return ok;
    }

    /** Entity id for a cluster prefix, or null when nothing matches. */
    public resolve(prefix: string): string | null {
        const country = this.countryForPrefix(prefix);
        if (!country) return null;
        return this.snapshot.countryToEntity.get(country) ?? null;
    }

    /**
     * Country name for a prefix or callsign. An exact-callsign entry matches
     * only the whole string; otherwise the full prefix is tried and then ever
     * shorter leading parts of it ("IT9" -> "IT" -> "I").
     */
    public countryForPrefix(prefix: string): string | null {
        const { prefixes, exactCalls } = this.snapshot;
        const normalized = prefix.trim().toUpperCase();

        const exact = exactCalls.get(normalized);
        if (exact) return exact;

        for (let length = normalized.length; length > 0; length--) {
            const country = prefixes.get(normalized.slice(0, length));
            if (country) return country;
        }
        return null;
    }

    public entityForPrefix(prefix: string): EntityRecord | null {
        const country = this.countryForPrefix(prefix);
        return country ? this.snapshot.entities.get(country) ?? null : null;
    }

    public entityName(entityId: string): string | null {
        return this.snapshot.entityNames[entityId] ?? null;
    }

    /** Primary on-air prefix for an entity id, for display. */
    public primaryPrefixFor(entityId: string): string | null {
        for (const [country, id] of this.snapshot.countryToEntity) {
            if (id !== entityId) continue;
            const record = this.snapshot.entities.get(country);
            if (record) return record.primaryPrefix;
        }
        return null;
    }

    public isLoaded(): boolean {
        return this.snapshot !== EMPTY_SNAPSHOT;
    }

    public getStats(): ResolverStats {
        const { prefixes, exactCalls, countryToEntity } = this.snapshot;
        return {
            loaded: this.isLoaded(),
            prefixes: prefixes.size,
            exactCalls: exactCalls.size,
            countries: new Set([...prefixes.values(), ...exactCalls.values()]).size,
            mappedCountries: countryToEntity.size,
        };
    }
}
