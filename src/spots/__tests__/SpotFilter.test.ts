import { describe, it, expect } from 'vitest';
import { buildSpotFilter, callPrefix, isBlockedSpotter } from '../SpotFilter';
import type { ClassifiedSpot } from '../types';
import type { Spot } from '../../cluster/types';

function entry(overrides: Partial<Spot> = {}, flags: Partial<ClassifiedSpot> = {}): ClassifiedSpot {
    const spot: Spot = {
        time: '1200Z',
        date: '20-Dec-2025',
        band: '20m',
        frequency: '14025.0',
        callsign: 'IT9ABC',
        prefix: 'IT9',
        grid: 'JM77',
        spotter: 'W3LPL-2',
        comment: '',
        receivedAt: 0,
        ...overrides,
    };
    return { spot, entityId: '248', neededMultiBand: false, neededGrid: false, ...flags };
}

describe('callPrefix', () => {
    it('takes the leading letters and digits before any slash', () => {
        expect(callPrefix('ea8/dl1abc')).toBe('EA8');
        expect(callPrefix('K1ABC')).toBe('K1ABC');
        expect(callPrefix('/P')).toBe('');
    });
});

describe('isBlockedSpotter', () => {
    it('matches the exact call or the base call of a skimmer', () => {
        const blocked = new Set(['W3LPL', 'DK8NE-1']);
        expect(isBlockedSpotter('w3lpl-2', blocked)).toBe(true);
        expect(isBlockedSpotter('DK8NE-1', blocked)).toBe(true);
        expect(isBlockedSpotter('DK8NE-2', blocked)).toBe(false);
        expect(isBlockedSpotter('K1TTT', blocked)).toBe(false);
    });
});

describe('buildSpotFilter', () => {
    it('passes everything without options', () => {
        expect(buildSpotFilter()(entry())).toBe(true);
    });

    it('matches bands without regard to case or unit', () => {
        const filter = buildSpotFilter({ bands: ['20M', '15m'] });
        expect(filter(entry({ band: '20m' }))).toBe(true);
        expect(filter(entry({ band: '15m' }))).toBe(true);
        expect(filter(entry({ band: '40m' }))).toBe(false);
    });

    it('matches the grid as a prefix', () => {
        const filter = buildSpotFilter({ grid: 'jm' });
        expect(filter(entry({ grid: 'JM77' }))).toBe(true);
        expect(filter(entry({ grid: 'FN31' }))).toBe(false);
        expect(filter(entry({ grid: '' }))).toBe(false);
    });

    it('matches the entity prefix as a substring', () => {
        const filter = buildSpotFilter({ entityPrefix: 't9' });
        expect(filter(entry({ prefix: 'IT9' }))).toBe(true);
        expect(filter(entry({ prefix: 'I' }))).toBe(false);
    });

    it('keeps only needed spots when asked', () => {
        const filter = buildSpotFilter({ neededOnly: true });
        expect(filter(entry())).toBe(false);
        expect(filter(entry({}, { neededMultiBand: true }))).toBe(true);
        expect(filter(entry({}, { neededGrid: true }))).toBe(true);
    });

    it('drops blocked spotters and blocked callsign prefixes', () => {
        const filter = buildSpotFilter({ blockedSpotters: ['w3lpl'], blockedPrefixes: ['EA8'] });
        expect(filter(entry())).toBe(false);
        expect(filter(entry({ spotter: 'K1TTT', callsign: 'EA8/DL1ABC' }))).toBe(false);
        expect(filter(entry({ spotter: 'K1TTT', callsign: 'DL1ABC/EA8' }))).toBe(true);
    });
});
