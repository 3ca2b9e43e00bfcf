import { z } from 'zod';
import fs from 'fs';
import path from 'path';

export const ConfigSchema = z.object({
    station: z.object({
        callsign: z.string().default(''),
        grid: z.string().default(''),
    }),
    cluster: z.object({
        host: z.string().default('www.ve7cc.net'),
        port: z.number().int().positive().default(23),
        // Sent right after the callsign on every (re)connect
        loginCommands: z.array(z.string()).default(['set/nofilter', 'set/ve7cc', 'set/skimmer', 'set/nodedupe']),
        reconnectDelaySeconds: z.number().positive().default(5),
        connectTimeoutMs: z.number().int().positive().default(15000),
        bannerLines: z.number().int().min(0).default(5),   // Welcome lines discarded after login
        bannerTimeoutMs: z.number().int().positive().default(3000),
        autoConnect: z.boolean().default(true),
    }),
    display: z.object({
        neededSpotMinutes: z.number().positive().default(15),  // How long needed spots stay highlighted
        maxSpots: z.number().int().positive().default(500),     // Regular buffer capacity
        rebuildIntervalMs: z.number().int().min(0).default(2000),
        blockedSpotters: z.array(z.string()).default([]),
        blockedPrefixes: z.array(z.string()).default([]),
    }),
    data: z.object({
        ctyPath: z.string().default('cty.dat'),
        dxccMappingPath: z.string().default('dxcc_mapping.json'),
        challengePath: z.string().default('challenge_data.json'),
        gridDataPath: z.string().default('ffma_data.json'),
        eligibleGridsPath: z.string().default('ffma_grids.json'),
        watchIntervalSeconds: z.number().int().min(0).default(30),  // 0 disables file watching
        importDir: z.string().default('.'),  // ADIF imports are read from here only
    }),
    awards: z.object({
        gridBand: z.string().default('6M'),
    }),
    // Tool server on stdio for assistants
    mcp: z.object({
        enabled: z.boolean().default(false),
        name: z.string().default('dx-spot-monitor'),
        version: z.string().default('1.0.0'),
    }),
    web: z.object({
        port: z.number().int().positive().default(3000),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILE = path.join(process.cwd(), 'config.json');

type ConfigSource = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigSource {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: ConfigSource, key: string): ConfigSource {
    const value = source[key];
    return isRecord(value) ? { ...value } : {};
}

function readConfigFile(): ConfigSource {
    if (!fs.existsSync(CONFIG_FILE)) {
        return {};
    }

    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(CONFIG_FILE, 'utf-8'));
        if (isRecord(parsed)) {
            return parsed;
        }
        console.warn('Ignoring config.json: top level is not an object');
    } catch (error) {
        console.error('Error loading config.json:', error);
    }
    return {};
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Build the effective configuration from config.json and the environment.
 * Environment variables take precedence over the file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const fileConfig = readConfigFile();

    const cluster = section(fileConfig, 'cluster');
    const station = section(fileConfig, 'station');
    const web = section(fileConfig, 'web');

    if (env.CLUSTER_HOST) cluster.host = env.CLUSTER_HOST;
    const clusterPort = envNumber(env, 'CLUSTER_PORT');
    if (clusterPort !== undefined) cluster.port = clusterPort;
    if (env.CLUSTER_CALLSIGN) station.callsign = env.CLUSTER_CALLSIGN.toUpperCase();
    const webPort = envNumber(env, 'WEB_PORT');
    if (webPort !== undefined) web.port = webPort;

    return ConfigSchema.parse({
        station,
        cluster,
        display: section(fileConfig, 'display'),
        data: section(fileConfig, 'data'),
        awards: section(fileConfig, 'awards'),
        mcp: section(fileConfig, 'mcp'),
        web,
    });
}

export function saveConfig(config: ConfigSource): Config {
    const existingConfig = readConfigFile();

    const mergedConfig: ConfigSource = { ...existingConfig };
    for (const [key, value] of Object.entries(config)) {
        mergedConfig[key] = isRecord(value) ? { ...section(existingConfig, key), ...value } : value;
    }

    // Validate before touching the file
    const parsed = ConfigSchema.parse({
        station: section(mergedConfig, 'station'),
        cluster: section(mergedConfig, 'cluster'),
        display: section(mergedConfig, 'display'),
        data: section(mergedConfig, 'data'),
        awards: section(mergedConfig, 'awards'),
        mcp: section(mergedConfig, 'mcp'),
        web: section(mergedConfig, 'web'),
    });

    fs.writeFileSync(CONFIG_FILE, JSON.stringify(mergedConfig, null, 2));
    console.log('Config saved to config.json');

    return parsed;
}

export function hasConfigFile(): boolean {
    return fs.existsSync(CONFIG_FILE);
}

export function getConfigFilePath(): string {
    return CONFIG_FILE;
}
