// DX cluster wire records and link events

export const UNKNOWN_BAND = 'unknown';

export interface Spot {
    readonly time: string;          // Time of day as sent by the cluster (e.g. "1234Z")
    readonly date: string;          // Cluster date string (e.g. "20-Dec-2025")
    readonly band: string;          // Band label ("20m") or UNKNOWN_BAND
    readonly frequency: string;     // kHz, as received
    readonly callsign: string;
    readonly prefix: string;        // DX entity prefix reported by the cluster
    readonly grid: string;          // 0-6 characters
    readonly spotter: string;
    readonly comment: string;
    readonly receivedAt: number;    // Epoch ms when the line was parsed
}

export interface SolarUpdate {
    readonly date: string;
    readonly hour: number;
    readonly sfi: number;           // 10.7 cm solar flux index
    readonly aIndex: number;        // Geomagnetic A-index
    readonly kIndex: number;        // Geomagnetic K-index
    readonly forecast: string;
}

export type IgnoreReason =
    | 'blank'
    | 'non-spot'
    | 'malformed-solar'
    | 'too-few-fields'
    | 'not-spot-record';

export type ParseResult =
    | { kind: 'spot'; spot: Spot }
    | { kind: 'solar'; solar: SolarUpdate }
    | { kind: 'ignore'; reason: IgnoreReason };

export type ConnectionState =
    | 'idle'
    | 'connecting'
    | 'authenticating'
    | 'streaming'
    | 'reconnecting'
    | 'disconnecting'
    | 'stopped';

export type CommandStatus = 'sent' | 'failed' | 'response';

// Everything a ClusterLink reports, as one closed union keyed on `type`
export type ClusterEvent =
    | { type: 'spot'; spot: Spot }
    | { type: 'solar'; solar: SolarUpdate }
    | { type: 'status'; state: ConnectionState; message: string }
    | { type: 'command'; status: CommandStatus; text: string };
