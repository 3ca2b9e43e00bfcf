import { UNKNOWN_BAND } from '../cluster/types';

export interface WorkedGrid {
    call: string;
    date: string;
}

export interface ChallengeStats {
    loaded: boolean;
    totalEntities: number;
    totalSlots: number;
    bands: Record<string, number>;
}

export interface GridStats {
    eligible: number;
    worked: number;
    completionPct: number;
}

/** "20m", "20 M" and "20" all become "20M". */
export function normalizeBand(band: string): string {
    const value = band.trim().toUpperCase().replace(/\s+/g, '');
    if (!value) return '';
    return value.endsWith('M') ? value : `${value}M`;
}

/** "001" and " 1" become "1"; anything that is not a number stays as typed. */
export function normalizeEntityId(entityId: string | number): string {
    const value = String(entityId).trim();
    return /^\d+$/.test(value) ? String(parseInt(value, 10)) : value;
}

/** Four-character grid square, or null for anything shorter. */
export function normalizeGrid(grid: string | null | undefined): string | null {
    if (!grid) return null;
    const value = grid.trim().toUpperCase();
    return value.length >= 4 ? value.slice(0, 4) : null;
}

/** ISO "YYYY-MM-DD"; anything else counts as an unknown date. */
export function isKnownDate(date: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(date);
}

/** True when `candidate` should replace `existing` as the first QSO for a grid. */
export function isEarlierQso(candidate: WorkedGrid, existing: WorkedGrid | undefined): boolean {
    if (!existing) return true;
    return isKnownDate(candidate.date) && isKnownDate(existing.date) && candidate.date < existing.date;
}

function slotKey(band: string, entityId: string): string {
    return `${band}|${entityId}`;
}

/**
 * Award progress: which (band, entity) Challenge slots and which 6m grids are
 * already confirmed. Every load replaces its set in one assignment.
 */
export class AwardTracker {
    private challengeSlots: ReadonlySet<string> = new Set();
    private challengeEntities: ReadonlySet<string> = new Set();
    private bandCounts: Readonly<Record<string, number>> = {};
    private workedGrids: ReadonlyMap<string, WorkedGrid> = new Map();
    private eligibleGrids: ReadonlySet<string> = new Set();

    public loadChallenge(pairs: ReadonlyArray<readonly [string, string | number]>): void {
        const slots = new Set<string>();
        const entities = new Set<string>();
        const perBand = new Map<string, Set<string>>();

        for (const [rawBand, rawEntity] of pairs) {
            const band = normalizeBand(rawBand);
            const entityId = normalizeEntityId(rawEntity);
            if (!band || !entityId) continue;

            slots.add(slotKey(band, entityId));
            entities.add(entityId);
            let bandEntities = perBand.get(band);
            if (!bandEntities) {
                bandEntities = new Set();
                perBand.set(band, bandEntities);
            }
            bandEntities.add(entityId);
        }

        const bands: Record<string, number> = {};
        for (const [band, bandEntities] of perBand) {
            bands[band] = bandEntities.size;
        }

        this.challengeSlots = slots;
        this.challengeEntities = entities;
        this.bandCounts = bands;
    }

    public loadWorkedGrids(records: Readonly<Record<string, WorkedGrid>>): void {
        const grids = new Map<string, WorkedGrid>();
        for (const [rawGrid, record] of Object.entries(records)) {
            const grid = normalizeGrid(rawGrid);
            if (grid && isEarlierQso(record, grids.get(grid))) {
                grids.set(grid, { call: record.call, date: record.date });
            }
        }
        this.workedGrids = grids;
    }

    public loadEligibleGrids(grids: Iterable<string>): void {
        const eligible = new Set<string>();
        for (const rawGrid of grids) {
            const grid = normalizeGrid(rawGrid);
            if (grid) eligible.add(grid);
        }
        this.eligibleGrids = eligible;
    }

    public hasChallengeData(): boolean {
        return this.challengeSlots.size > 0;
    }

    /**
     * True when the entity has not been confirmed on this band. Nothing is
     * needed until Challenge data is loaded, and never for an unresolved
     * entity or an unknown band.
     */
    public isNeededMultiBand(entityId: string | null, band: string): boolean {
        if (!this.hasChallengeData() || entityId === null) return false;
        if (!band || band.toLowerCase() === UNKNOWN_BAND) return false;

        const normalizedBand = normalizeBand(band);
        return !this.challengeSlots.has(slotKey(normalizedBand, normalizeEntityId(entityId)));
    }

    public isNeededGrid(grid: string | null | undefined): boolean {
        const normalized = normalizeGrid(grid);
        if (!normalized) return false;
        return this.eligibleGrids.has(normalized) && !this.workedGrids.has(normalized);
    }

    public getWorkedGrid(grid: string): WorkedGrid | null {
        const normalized = normalizeGrid(grid);
        return normalized ? this.workedGrids.get(normalized) ?? null : null;
    }

    public getEligibleGrids(): ReadonlySet<string> {
        return this.eligibleGrids;
    }

    public getChallengeStats(): ChallengeStats {
        return {
            loaded: this.hasChallengeData(),
            totalEntities: this.challengeEntities.size,
            totalSlots: this.challengeSlots.size,
            bands: { ...this.bandCounts },
        };
    }

    public getGridStats(): GridStats {
        const eligible = this.eligibleGrids.size;
        let worked = 0;
        for (const grid of this.workedGrids.keys()) {
            // Worked grids outside the catalog do not count toward the award
            if (eligible === 0 || this.eligibleGrids.has(grid)) worked++;
        }
        const completionPct = eligible > 0 ? Math.round((worked / eligible) * 1000) / 10 : 0;
        return { eligible, worked, completionPct };
    }
}
