import { describe, it, expect, beforeEach } from 'vitest';
import { AwardTracker, normalizeBand, normalizeEntityId, normalizeGrid } from '../AwardTracker';

describe('normalizers', () => {
    it.each([
        ['20m', '20M'],
        ['20 M', '20M'],
        ['20', '20M'],
        ['6M', '6M'],
        ['', ''],
    ])('normalizeBand(%j) -> %j', (input, expected) => {
        expect(normalizeBand(input)).toBe(expected);
    });

    it('drops leading zeros from entity ids', () => {
        expect(normalizeEntityId('001')).toBe('1');
        expect(normalizeEntityId(' 291 ')).toBe('291');
        expect(normalizeEntityId(248)).toBe('248');
    });

    it('keeps the first four grid characters', () => {
        expect(normalizeGrid('fn31pr')).toBe('FN31');
        expect(normalizeGrid('FN3')).toBeNull();
        expect(normalizeGrid(undefined)).toBeNull();
    });
});

describe('AwardTracker', () => {
    let tracker: AwardTracker;

    beforeEach(() => {
        tracker = new AwardTracker();
    });

    it('reports nothing as needed before Challenge data is loaded', () => {
        expect(tracker.isNeededMultiBand('248', '20m')).toBe(false);
        expect(tracker.getChallengeStats()).toEqual({ loaded: false, totalEntities: 0, totalSlots: 0, bands: {} });
    });

    it('needs a slot only when the entity is unconfirmed on that band', () => {
        tracker.loadChallenge([['20M', '248'], ['15m', '0248'], ['20', 291]]);

        expect(tracker.isNeededMultiBand('248', '20m')).toBe(false);
        expect(tracker.isNeededMultiBand('248', '15M')).toBe(false);
        expect(tracker.isNeededMultiBand('248', '40m')).toBe(true);
        expect(tracker.isNeededMultiBand('291', '20m')).toBe(false);
        expect(tracker.isNeededMultiBand('110', '20m')).toBe(true);
    });

    it('never needs an unknown entity or band', () => {
        tracker.loadChallenge([['20M', '248']]);
        expect(tracker.isNeededMultiBand(null, '20m')).toBe(false);
        expect(tracker.isNeededMultiBand('110', 'unknown')).toBe(false);
        expect(tracker.isNeededMultiBand('110', '')).toBe(false);
    });

    it('replaces Challenge data wholesale', () => {
        tracker.loadChallenge([['20M', '248']]);
        tracker.loadChallenge([['40M', '110']]);
        expect(tracker.isNeededMultiBand('248', '20m')).toBe(true);
        expect(tracker.isNeededMultiBand('110', '40m')).toBe(false);
    });

    it('counts entities per band', () => {
        tracker.loadChallenge([['20M', '248'], ['20M', '291'], ['15M', '248'], ['20M', '248']]);
        expect(tracker.getChallengeStats()).toEqual({
            loaded: true,
            totalEntities: 2,
            totalSlots: 3,
            bands: { '20M': 2, '15M': 1 },
        });
    });

    it('needs grids that are eligible and not yet worked', () => {
        tracker.loadEligibleGrids(['FN31', 'FN42', 'EM10']);
        tracker.loadWorkedGrids({ fn31pr: { call: 'K1ABC', date: '2024-06-01' } });

        expect(tracker.isNeededGrid('FN42')).toBe(true);
        expect(tracker.isNeededGrid('fn42aa')).toBe(true);
        expect(tracker.isNeededGrid('FN31')).toBe(false);
        expect(tracker.isNeededGrid('JN45')).toBe(false);
        expect(tracker.isNeededGrid('')).toBe(false);
        expect(tracker.getWorkedGrid('FN31AA')).toEqual({ call: 'K1ABC', date: '2024-06-01' });
    });

    it('keeps the earliest QSO when several keys share a grid', () => {
        tracker.loadWorkedGrids({
            FN31PR: { call: 'K1ABC', date: '2024-06-01' },
            FN31: { call: 'K2DEF', date: '2023-07-15' },
            fn31aa: { call: 'K3GHI', date: '2024-01-01' },
            FN42: { call: 'W1AAA', date: 'Unknown' },
            fn42bb: { call: 'W2BBB', date: '2022-01-01' },
        });

        expect(tracker.getWorkedGrid('FN31')).toEqual({ call: 'K2DEF', date: '2023-07-15' });
        expect(tracker.getWorkedGrid('FN42')).toEqual({ call: 'W1AAA', date: 'Unknown' });
    });

    it('reports grid award progress', () => {
        tracker.loadEligibleGrids(['FN31', 'FN42', 'EM10', 'EM11']);
        tracker.loadWorkedGrids({
            FN31: { call: 'K1ABC', date: '2024-06-01' },
            JN45: { call: 'I1XYZ', date: '2024-06-02' },
        });
        expect(tracker.getGridStats()).toEqual({ eligible: 4, worked: 1, completionPct: 25 });
    });
});
