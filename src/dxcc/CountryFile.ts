// Parser for the CTY.DAT country file (country-files.com)
//
// Each entity is a header line followed by prefix lines:
//   Italy:                    15:  28:  EU:   42.82:   -12.58:    -1.0:  I:
//       I,IK0,IZ0,=II0GDF/J,IT9(15)[28],...;

export interface EntityRecord {
    name: string;
    primaryPrefix: string;
    continent: string;
    cqZone: number;
    ituZone: number;
    latitude: number;
    longitude: number;
    gmtOffset: number;
}

export interface CountryFile {
    entities: EntityRecord[];
    // Upper-cased prefix -> entity name
    prefixes: Map<string, string>;
    // "=CALL" entries: whole upper-cased callsign -> entity name
    exactCalls: Map<string, string>;
}

// (CQ zone) [ITU zone] <lat/lon> {continent} ~gmt offset~
const OVERRIDE_PATTERN = /\(.*?\)|\[.*?\]|<.*?>|\{.*?\}|~.*?~/g;

function isHeaderLine(line: string): boolean {
    return line.endsWith(':') && line.split(':').length - 1 >= 7;
}

function toNumber(value: string): number {
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
}

function parseHeader(line: string): EntityRecord {
    const parts = line.split(':').map(part => part.trim());
    // A leading '*' marks entities that only count for WAE/CQ, not DXCC
    const primaryPrefix = parts[7].replace(/^\*/, '');

    return {
        name: parts[0],
        primaryPrefix: primaryPrefix.toUpperCase(),
        cqZone: parseInt(parts[1], 10) || 0,
        ituZone: parseInt(parts[2], 10) || 0,
        continent: parts[3],
        latitude: toNumber(parts[4]),
        // The file uses west-positive longitude
        longitude: -toNumber(parts[5]),
        gmtOffset: -toNumber(parts[6]),
    };
}

/**
 * Strip the notations around a single prefix entry.
 * Returns the bare prefix and whether it named one exact callsign.
 */
export function cleanPrefixEntry(entry: string): { prefix: string; exact: boolean } {
    let value = entry.trim();
    const exact = value.startsWith('=');
    if (exact) {
        value = value.slice(1);
    }

    value = value.replace(OVERRIDE_PATTERN, '');
    // Unbalanced leftovers from bracketed alternates
    value = value.replace(/[[\]()]/g, '');

    return { prefix: value.trim().toUpperCase(), exact };
}

export function parseCountryFile(content: string): CountryFile {
    const entities: EntityRecord[] = [];
    const prefixes = new Map<string, string>();
    const exactCalls = new Map<string, string>();

    let current: EntityRecord | null = null;

    for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) continue;

        if (isHeaderLine(line)) {
            current = parseHeader(line);
            entities.push(current);
            continue;
        }

        if (!current) continue;

        const entries = line.replace(/;$/, '').split(',');
        for (const entry of entries) {
            if (!entry.trim()) continue;

            const { prefix, exact } = cleanPrefixEntry(entry);
            if (!prefix) continue;

            // Later entries win over earlier ones for the same key
            if (exact) {
                exactCalls.set(prefix, current.name);
            } else {
                prefixes.set(prefix, current.name);
            }
        }
    }

    return { entities, prefixes, exactCalls };
}
