import { describe, it, expect } from 'vitest';
import { cleanPrefixEntry, parseCountryFile } from '../CountryFile';
import { SAMPLE_COUNTRY_FILE } from './fixtures';

describe('cleanPrefixEntry', () => {
    it('marks exact callsigns and strips zone overrides', () => {
        expect(cleanPrefixEntry('=W1AW/KH6(31)[61]')).toEqual({ prefix: 'W1AW/KH6', exact: true });
    });

    it('strips location, continent and offset overrides', () => {
        expect(cleanPrefixEntry(' ik0<41.9/-12.5>{EU}~1.0~ ')).toEqual({ prefix: 'IK0', exact: false });
    });
});

describe('parseCountryFile', () => {
    const countryFile = parseCountryFile(SAMPLE_COUNTRY_FILE);

    it('reads every entity header', () => {
        expect(countryFile.entities.map(entity => entity.name)).toEqual([
            'United States',
            'Italy',
            'Sicily',
            'Hawaii',
            'England',
        ]);
    });

    it('parses header fields with east-positive longitude', () => {
        expect(countryFile.entities[2]).toEqual({
            name: 'Sicily',
            primaryPrefix: 'IT9',
            continent: 'EU',
            cqZone: 15,
            ituZone: 28,
            latitude: 37.5,
            longitude: 14,
            gmtOffset: 1,
        });
    });

    it('maps prefixes to their entity', () => {
        expect(countryFile.prefixes.get('IT9')).toBe('Sicily');
        expect(countryFile.prefixes.get('KH6')).toBe('Hawaii');
        expect(countryFile.prefixes.size).toBe(18);
    });

    it('keeps exact callsigns apart from prefixes', () => {
        expect(Object.fromEntries(countryFile.exactCalls)).toEqual({ 'W1AW/KH6': 'United States' });
        expect(countryFile.prefixes.has('W1AW/KH6')).toBe(false);
    });

    it('lets a later entry win for a repeated prefix', () => {
        const parsed = parseCountryFile([
            'Italy:   15:  28:  EU:   42.82:   -12.58:    -1.0:  I:',
            '    I,IT9,=IT9ZZZ;',
            'Sicily:  15:  28:  EU:   37.50:   -14.00:    -1.0:  *IT9:',
            '    IT9,=IT9ZZZ;',
        ].join('\n'));
        expect(parsed.prefixes.get('IT9')).toBe('Sicily');
        expect(parsed.exactCalls.get('IT9ZZZ')).toBe('Sicily');
    });

    it('ignores prefix lines before the first header', () => {
        const parsed = parseCountryFile('    K,N,W;\n');
        expect(parsed.entities).toEqual([]);
        expect(parsed.prefixes.size).toBe(0);
    });
});
