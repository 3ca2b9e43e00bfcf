import fs from 'fs/promises';
import { isEarlierQso, normalizeBand, normalizeEntityId, normalizeGrid } from './AwardTracker';
import type { WorkedGrid } from './AwardTracker';

export type AdifRecord = Record<string, string>;

export type AdifImportKind = 'challenge' | 'grids';

export interface ChallengeSummary {
    totalEntities: number;
    totalSlots: number;
    entitiesByBand: Record<string, number>;
    entitiesByMode: Record<string, number>;
    entities: string[];
    pairs: Array<[string, string]>;
}

export interface WorkedGridOptions {
    band?: string;
    homeGrid?: string;
    eligible?: ReadonlySet<string>;
}

export interface ImportResult {
    kind: AdifImportKind;
    records: number;
    outputPath: string;
    // Entities for a Challenge import, grids for a grid import
    count: number;
}

const EOH = '<eoh>';

function readFields(record: string): AdifRecord {
    const fields: AdifRecord = {};

    // <FIELDNAME:LENGTH>VALUE or <FIELDNAME:LENGTH:TYPE>VALUE
    const fieldPattern = /<([A-Za-z0-9_]+):(\d+)(?::[A-Za-z])?>/g;
    let match: RegExpExecArray | null;

    while ((match = fieldPattern.exec(record)) !== null) {
        const fieldName = match[1].toLowerCase();
        const length = parseInt(match[2], 10);
        const valueStart = match.index + match[0].length;
        fields[fieldName] = record.substring(valueStart, valueStart + length).trim();
        fieldPattern.lastIndex = valueStart + length;
    }

    return fields;
}

/** Split an ADIF document into records of lower-case field name -> value. */
export function parseAdifRecords(text: string): AdifRecord[] {
    const headerEnd = text.toLowerCase().indexOf(EOH);
    const body = headerEnd >= 0 ? text.substring(headerEnd + EOH.length) : text;

    const records: AdifRecord[] = [];
    for (const chunk of body.split(/<eor>/i)) {
        if (!chunk.trim()) continue;
        const fields = readFields(chunk);
        if (Object.keys(fields).length > 0) {
            records.push(fields);
        }
    }
    return records;
}

function countSets(groups: Map<string, Set<string>>): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [key, members] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
        counts[key] = members.size;
    }
    return counts;
}

function addTo(groups: Map<string, Set<string>>, key: string, member: string): void {
    let members = groups.get(key);
    if (!members) {
        members = new Set();
        groups.set(key, members);
    }
    members.add(member);
}

/** Challenge credits from DXCC credit records. Records without a DXCC field are skipped. */
export function summarizeChallenge(records: readonly AdifRecord[]): ChallengeSummary {
    const entities = new Set<string>();
    const pairs = new Map<string, [string, string]>();
    const byBand = new Map<string, Set<string>>();
    const byMode = new Map<string, Set<string>>();

    for (const record of records) {
        const dxcc = record.dxcc ? normalizeEntityId(record.dxcc) : '';
        if (!dxcc) continue;
        entities.add(dxcc);

        const band = record.band ? normalizeBand(record.band) : '';
        if (band) {
            pairs.set(`${band}|${dxcc}`, [band, dxcc]);
            addTo(byBand, band, dxcc);
        }

        const mode = record.mode?.toUpperCase();
        if (mode) {
            addTo(byMode, mode, dxcc);
        }
    }

    const sortedPairs = [...pairs.values()].sort(([bandA, idA], [bandB, idB]) =>
        bandA === bandB ? Number(idA) - Number(idB) : bandA.localeCompare(bandB)
    );

    return {
        totalEntities: entities.size,
        totalSlots: pairs.size,
        entitiesByBand: countSets(byBand),
        entitiesByMode: countSets(byMode),
        entities: [...entities].sort((a, b) => Number(a) - Number(b)),
        pairs: sortedPairs,
    };
}

/** "20240315" -> "2024-03-15"; other shapes pass through, blank becomes "Unknown". */
export function formatQsoDate(raw: string | undefined): string {
    const value = raw?.trim() ?? '';
    const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
    if (match) return `${match[1]}-${match[2]}-${match[3]}`;
    return value || 'Unknown';
}

/**
 * Confirmed grids on one band (6M unless told otherwise), keyed by 4-character
 * grid with the earliest QSO kept for each.
 */
export function collectWorkedGrids(
    records: readonly AdifRecord[],
    options: WorkedGridOptions = {}
): Record<string, WorkedGrid> {
    const band = normalizeBand(options.band ?? '6M');
    const homeGrid = normalizeGrid(options.homeGrid);
    const worked = new Map<string, WorkedGrid>();

    for (const record of records) {
        if (!record.band || normalizeBand(record.band) !== band) continue;

        if (homeGrid && record.my_gridsquare) {
            const myGrid = record.my_gridsquare.trim().toUpperCase().slice(0, 4);
            if (myGrid !== homeGrid) continue;
        }

        // VUCC_GRIDS lists every grid of a line or corner activation
        const candidates = record.vucc_grids
            ? record.vucc_grids.split(',')
            : record.gridsquare
                ? [record.gridsquare]
                : [];

        const call = (record.call ?? '').toUpperCase();
        const date = formatQsoDate(record.qso_date);

        for (const candidate of candidates) {
            const grid = normalizeGrid(candidate);
            if (!grid) continue;
            if (options.eligible && !options.eligible.has(grid)) continue;

            const qso: WorkedGrid = { call, date };
            if (isEarlierQso(qso, worked.get(grid))) {
                worked.set(grid, qso);
            }
        }
    }

    const result: Record<string, WorkedGrid> = {};
    for (const grid of [...worked.keys()].sort()) {
        const entry = worked.get(grid);
        if (entry) result[grid] = entry;
    }
    return result;
}

/**
 * Read an ADIF export and write the matching award data file:
 * challenge_data.json for DXCC credits, ffma_data.json for 6m grids.
 */
export async function importAdifFile(
    adifPath: string,
    kind: AdifImportKind,
    outputPath: string,
    options: WorkedGridOptions = {}
): Promise<ImportResult> {
    const text = await fs.readFile(adifPath, 'utf-8');
    const records = parseAdifRecords(text);

    if (kind === 'challenge') {
        const summary = summarizeChallenge(records);
        const data = {
            total_entities: summary.totalEntities,
            total_challenge_slots: summary.totalSlots,
            entities_by_band: summary.entitiesByBand,
            entities_by_mode: summary.entitiesByMode,
            raw_entity_set: summary.entities,
            raw_band_entity_pairs: summary.pairs,
        };
        await fs.writeFile(outputPath, JSON.stringify(data, null, 2), 'utf-8');
        console.log(`Imported ${summary.totalSlots} Challenge slots (${summary.totalEntities} entities) from ${adifPath}`);
        return { kind, records: records.length, outputPath, count: summary.totalEntities };
    }

    const workedGrids = collectWorkedGrids(records, options);
    const count = Object.keys(workedGrids).length;
    const data = {
        worked_grids: workedGrids,
        last_updated: new Date().toISOString(),
        total_worked: count,
    };
    await fs.writeFile(outputPath, JSON.stringify(data, null, 2), 'utf-8');
    console.log(`Imported ${count} worked grids from ${adifPath}`);
    return { kind, records: records.length, outputPath, count };
}
