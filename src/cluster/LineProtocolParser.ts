import { UNKNOWN_BAND } from './types';
import type { ParseResult, SolarUpdate, Spot } from './types';

// CC11^Freq^DX^Date^Time^Comments^Spotter^Hops^RX node^Origin node^Spotter ITU^Spotter CQ^
// DX ITU^DX CQ^Spotter state^DX state^DX prefix^DX DXCC^Grid^DX grid^Spot type^Spotter IP^Timestamp
export const SPOT_RECORD_TAG = 'CC11';
export const FIELD_DELIMITER = '^';
export const MIN_SPOT_FIELDS = 20;

const FIELD = {
    tag: 0,
    frequency: 1,
    callsign: 2,
    date: 3,
    time: 4,
    comment: 5,
    spotter: 6,
    prefix: 16,
    grid: 18,
} as const;

// Propagation bulletins and routed talk/announce lines
const NON_SPOT_PREFIXES = ['WWV', 'WCY', 'To '];

// "sh/wwv" rows: 20-Dec-2025   15   164   8   2 Minor w/R1 -> Minor w/R1
const SOLAR_DATE_TOKEN = /^\d{1,2}-[A-Za-z]{3}-\d{4}$/;
const SOLAR_MIN_LENGTH = 20;
const INTEGER_TOKEN = /^\d+$/;

export interface BandRange {
    low: number;    // kHz, inclusive
    high: number;   // kHz, inclusive
    label: string;
}

// ARRL band plan, ordered low to high
export const BAND_PLAN: readonly BandRange[] = [
    { low: 1800, high: 2000, label: '160m' },
    { low: 3500, high: 4000, label: '80m' },
    { low: 5000, high: 5450, label: '60m' },
    { low: 7000, high: 7300, label: '40m' },
    { low: 10100, high: 10150, label: '30m' },
    { low: 14000, high: 14350, label: '20m' },
    { low: 18068, high: 18168, label: '17m' },
    { low: 21000, high: 21450, label: '15m' },
    { low: 24890, high: 24990, label: '12m' },
    { low: 28000, high: 29700, label: '10m' },
    { low: 50000, high: 54000, label: '6m' },
];

/**
 * Map a frequency in kHz to its band label, or UNKNOWN_BAND when it is
 * outside every range or not a number.
 */
export function bandForFrequency(frequency: number | string): string {
    if (typeof frequency === 'string' && frequency.trim() === '') return UNKNOWN_BAND;
    const khz = typeof frequency === 'number' ? frequency : Number(frequency);
    if (!Number.isFinite(khz)) return UNKNOWN_BAND;

    for (const range of BAND_PLAN) {
        if (khz >= range.low && khz <= range.high) {
            return range.label;
        }
    }
    return UNKNOWN_BAND;
}

function parseSolarLine(line: string): SolarUpdate | null {
    const tokens = line.trim().split(/\s+/);
    if (tokens.length < 5) return null;

    const [date, hour, sfi, aIndex, kIndex] = tokens;
    if (![hour, sfi, aIndex, kIndex].every(token => INTEGER_TOKEN.test(token))) {
        return null;
    }

    return {
        date,
        hour: parseInt(hour, 10),
        sfi: parseInt(sfi, 10),
        aIndex: parseInt(aIndex, 10),
        kIndex: parseInt(kIndex, 10),
        forecast: tokens.slice(5).join(' '),
    };
}

function isSolarShape(line: string): boolean {
    if (line.length <= SOLAR_MIN_LENGTH) return false;
    const firstToken = line.trim().split(/\s+/, 1)[0];
    return SOLAR_DATE_TOKEN.test(firstToken);
}

/**
 * Classify one newline-stripped cluster line. Never throws: anything that
 * does not look like a spot or a solar report is ignored.
 */
export function parseLine(line: string, receivedAt: number = Date.now()): ParseResult {
    if (!line.trim()) {
        return { kind: 'ignore', reason: 'blank' };
    }

    const trimmed = line.trim();
    if (NON_SPOT_PREFIXES.some(prefix => trimmed.startsWith(prefix))) {
        return { kind: 'ignore', reason: 'non-spot' };
    }

    if (isSolarShape(trimmed)) {
        const solar = parseSolarLine(trimmed);
        return solar ? { kind: 'solar', solar } : { kind: 'ignore', reason: 'malformed-solar' };
    }

    const parts = trimmed.split(FIELD_DELIMITER);
    if (parts.length < MIN_SPOT_FIELDS) {
        return { kind: 'ignore', reason: 'too-few-fields' };
    }

    if (parts[FIELD.tag] !== SPOT_RECORD_TAG) {
        return { kind: 'ignore', reason: 'not-spot-record' };
    }

    const spot: Spot = {
        time: parts[FIELD.time].trim(),
        date: parts[FIELD.date].trim(),
        band: bandForFrequency(parts[FIELD.frequency]),
        frequency: parts[FIELD.frequency].trim(),
        callsign: parts[FIELD.callsign].trim().toUpperCase(),
        prefix: parts[FIELD.prefix].trim().toUpperCase(),
        grid: parts[FIELD.grid].trim().toUpperCase(),
        spotter: parts[FIELD.spotter].trim().toUpperCase(),
        comment: parts[FIELD.comment].trim(),
        receivedAt,
    };

    return { kind: 'spot', spot: Object.freeze(spot) };
}
