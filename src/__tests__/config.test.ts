import { describe, it, expect } from 'vitest';
import { ConfigSchema, loadConfig } from '../config';

const EMPTY_SECTIONS = { station: {}, cluster: {}, display: {}, data: {}, awards: {}, mcp: {}, web: {} };

describe('ConfigSchema', () => {
    it('fills every section with defaults', () => {
        const config = ConfigSchema.parse(EMPTY_SECTIONS);

        expect(config.cluster).toEqual({
            host: 'www.ve7cc.net',
            port: 23,
            loginCommands: ['set/nofilter', 'set/ve7cc', 'set/skimmer', 'set/nodedupe'],
            reconnectDelaySeconds: 5,
            connectTimeoutMs: 15000,
            bannerLines: 5,
            bannerTimeoutMs: 3000,
            autoConnect: true,
        });
        expect(config.display.neededSpotMinutes).toBe(15);
        expect(config.display.maxSpots).toBe(500);
        expect(config.awards.gridBand).toBe('6M');
        expect(config.mcp.enabled).toBe(false);
    });

    it('rejects values of the wrong type', () => {
        expect(ConfigSchema.safeParse({ ...EMPTY_SECTIONS, cluster: { port: 'telnet' } }).success).toBe(false);
        expect(ConfigSchema.safeParse({ ...EMPTY_SECTIONS, display: { maxSpots: 0 } }).success).toBe(false);
    });
});

describe('loadConfig', () => {
    it('lets the environment override the cluster and web settings', () => {
        const config = loadConfig({
            CLUSTER_HOST: 'cluster.test',
            CLUSTER_PORT: '7300',
            CLUSTER_CALLSIGN: 'n0call',
            WEB_PORT: '8080',
        });

        expect(config.cluster.host).toBe('cluster.test');
        expect(config.cluster.port).toBe(7300);
        expect(config.station.callsign).toBe('N0CALL');
        expect(config.web.port).toBe(8080);
    });

    it('ignores numeric variables that are not numbers', () => {
        const config = loadConfig({ CLUSTER_HOST: 'cluster.test', CLUSTER_PORT: 'telnet', WEB_PORT: ' ' });

        expect(config.cluster.host).toBe('cluster.test');
        expect(config.cluster.port).not.toBeNaN();
        expect(config.web.port).toBeGreaterThan(0);
    });
});
