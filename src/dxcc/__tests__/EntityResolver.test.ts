import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    EntityResolver,
    buildCountryIndex,
    fuzzyMatchCountry,
    normalizeCountryName,
    tokenOverlapRatio,
} from '../EntityResolver';
import { SAMPLE_COUNTRY_FILE, SAMPLE_ENTITY_NAMES } from './fixtures';

describe('country name matching', () => {
    it('normalizes case, spacing and parenthesised notes', () => {
        expect(normalizeCountryName('  Sicily  (Italy) ')).toBe('SICILY');
        expect(normalizeCountryName('Asiatic   Russia')).toBe('ASIATIC RUSSIA');
    });

    it('measures overlap against the larger word set', () => {
        expect(tokenOverlapRatio('United States', 'UNITED STATES OF AMERICA')).toBeCloseTo(2 / 3);
        expect(tokenOverlapRatio('South Africa', 'CENTRAL AFRICAN REPUBLIC')).toBe(0);
        expect(tokenOverlapRatio('', 'ITALY')).toBe(0);
    });

    it('accepts fuzzy matches at or above 0.6 only', () => {
        expect(fuzzyMatchCountry('United States', { '999': 'UNITED STATES OF AMERICA' })).toBe('999');
        expect(fuzzyMatchCountry('Fed. Rep. of Germany', { '230': 'FEDERAL REPUBLIC OF GERMANY' })).toBeNull();
    });

    it('prefers overrides, then exact names, then fuzzy matches', () => {
        const index = buildCountryIndex(
            ['Sicily', 'England', 'United States', 'Atlantis'],
            { '248': 'ITALY', '223': 'ENGLAND', '999': 'UNITED STATES OF AMERICA' }
        );
        expect(Object.fromEntries(index)).toEqual({
            Sicily: '248',
            England: '223',
            'United States': '999',
        });
    });

    it('skips overrides for entities missing from the table', () => {
        const index = buildCountryIndex(['Sicily'], { '1': 'CANADA' });
        expect(index.size).toBe(0);
    });
});

describe('EntityResolver', () => {
    let resolver: EntityResolver;

    beforeEach(() => {
        resolver = new EntityResolver();
        expect(resolver.initialize(SAMPLE_COUNTRY_FILE, SAMPLE_ENTITY_NAMES)).toBe(true);
    });

    it.each([
        ['IT9', '248'],
        ['IZ0ABC', '248'],
        ['K1ABC', '291'],
        ['KH6XX', '110'],
        ['w1aw/kh6', '291'],
        ['M0ABC', '223'],
    ])('resolves %s to %s', (prefix, entityId) => {
        expect(resolver.resolve(prefix)).toBe(entityId);
    });

    it('matches exact callsigns against the whole call only', () => {
        const alaska = new EntityResolver();
        alaska.initialize([
            'United States:  05:  08:  NA:   37.53:    91.67:     5.0:  K:',
            '    K,N,W;',
            'Alaska:         01:  01:  NA:   61.40:   148.87:     9.0:  KL:',
            '    AL,KL,NL,WL,=K1ABC;',
        ].join('\n'), { '291': 'UNITED STATES OF AMERICA', '6': 'ALASKA' });

        expect(alaska.resolve('k1abc')).toBe('6');
        expect(alaska.resolve('K1ABCD')).toBe('291');
        expect(alaska.resolve('K1AB')).toBe('291');
        expect(alaska.resolve('KL7XX')).toBe('6');
    });

    it('answers null for prefixes it cannot place', () => {
        expect(resolver.resolve('ZZZZZ')).toBeNull();
        expect(resolver.resolve('')).toBeNull();
    });

    it('exposes the entity record and names', () => {
        expect(resolver.countryForPrefix('IT9')).toBe('Sicily');
        expect(resolver.entityForPrefix('IT9')?.primaryPrefix).toBe('IT9');
        expect(resolver.entityName('248')).toBe('ITALY');
        expect(resolver.primaryPrefixFor('248')).toBe('I');
        expect(resolver.primaryPrefixFor('1')).toBeNull();
    });

    it('reports statistics', () => {
        expect(resolver.getStats()).toEqual({ loaded: true, prefixes: 18, exactCalls: 1, countries: 5, mappedCountries: 5 });
    });

    it('answers null for everything without data', () => {
        expect(resolver.initialize(null, SAMPLE_ENTITY_NAMES)).toBe(false);
        expect(resolver.isLoaded()).toBe(false);
        expect(resolver.resolve('IT9')).toBeNull();
        expect(resolver.getStats()).toEqual({ loaded: false, prefixes: 0, exactCalls: 0, countries: 0, mappedCountries: 0 });
    });

    it('stays unloaded when no country maps to an entity', () => {
        expect(resolver.initialize(SAMPLE_COUNTRY_FILE, { '1': 'CANADA' })).toBe(false);
        expect(resolver.resolve('K1ABC')).toBeNull();
    });
});

describe('EntityResolver.loadFromFiles', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dxcc-'));
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads the country file and the entity table', async () => {
        const ctyPath = path.join(dir, 'cty.dat');
        const mappingPath = path.join(dir, 'dxcc_mapping.json');
        fs.writeFileSync(ctyPath, SAMPLE_COUNTRY_FILE);
        fs.writeFileSync(mappingPath, JSON.stringify({ ' 248 ': 'ITALY', '110': 'HAWAII' }));

        const resolver = new EntityResolver();
        expect(await resolver.loadFromFiles(ctyPath, mappingPath)).toBe(true);
        expect(resolver.resolve('IT9')).toBe('248');
        expect(resolver.resolve('KH6')).toBe('110');
        expect(resolver.resolve('K1ABC')).toBeNull();
    });

    it('rejects an entity table with a name that is not a string', async () => {
        const ctyPath = path.join(dir, 'cty.dat');
        const mappingPath = path.join(dir, 'dxcc_mapping.json');
        fs.writeFileSync(ctyPath, SAMPLE_COUNTRY_FILE);
        fs.writeFileSync(mappingPath, JSON.stringify({ '248': 'ITALY', '5': 42 }));

        const resolver = new EntityResolver();
        expect(await resolver.loadFromFiles(ctyPath, mappingPath)).toBe(false);
        expect(console.warn).toHaveBeenCalledWith(
            `Entity name table ignored (${mappingPath}): 5: Expected string, received number`
        );
        expect(resolver.resolve('IT9')).toBeNull();
    });

    it('degrades to an empty resolver when a file is missing', async () => {
        const resolver = new EntityResolver();
        const ok = await resolver.loadFromFiles(path.join(dir, 'missing.dat'), path.join(dir, 'missing.json'));
        expect(ok).toBe(false);
        expect(resolver.resolve('IT9')).toBeNull();
        expect(console.warn).toHaveBeenCalled();
    });
});
