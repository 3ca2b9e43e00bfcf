import { EventEmitter } from 'events';
import path from 'path';
import type { Config } from '../config';
import { ClusterLink } from '../cluster/ClusterLink';
import type { SocketFactory } from '../cluster/ClusterLink';
import { BAND_PLAN } from '../cluster/LineProtocolParser';
import type { ClusterEvent, ConnectionState, SolarUpdate, Spot } from '../cluster/types';
import { EntityResolver } from '../dxcc/EntityResolver';
import type { ResolverStats } from '../dxcc/EntityResolver';
import type { EntityRecord } from '../dxcc/CountryFile';
import { AwardTracker, normalizeBand } from '../awards/AwardTracker';
import type { ChallengeStats, GridStats } from '../awards/AwardTracker';
import { AwardDataLoader } from '../awards/AwardDataLoader';
import type { AwardLoadResult } from '../awards/AwardDataLoader';
import { importAdifFile } from '../awards/AdifImport';
import type { AdifImportKind, ImportResult } from '../awards/AdifImport';
import { SpotClassifierBuffer } from '../spots/SpotClassifierBuffer';
import type { ClassifierContext } from '../spots/SpotClassifierBuffer';
import { buildSpotFilter } from '../spots/SpotFilter';
import type { SpotFilterOptions } from '../spots/SpotFilter';
import type { BufferStats, ClassifiedSpot } from '../spots/types';
import { describeError } from '../util/abort';

export const CLUSTER_COMMAND_HELP = `Common cluster commands:

FILTERS (reduce spot volume):
  set/filter doc/pass k,ve        - Only spots from US/Canada spotters
  set/filter dxcty/pass <prefix>  - Only spots for specific countries
  set/filter dxbm/pass 20,15,10   - Only specific bands
  set/nofilter                    - Reset all filters
  sh/filter                       - Show current filters

DISPLAY OPTIONS:
  set/noskimmer   - Turn off skimmer spots
  set/skimmer     - Turn on skimmer spots
  set/nobeacon    - Turn off beacon spots
  set/grid        - Show grid squares
  set/dxs         - Show DX state/country

INFORMATION:
  sh/dx           - Show last 30 spots
  sh/dx/100       - Show last 100 spots
  sh/dx <call>    - Show spots for specific call
  sh/mydx         - Show spots matching your filters
  sh/settings     - Show your current settings

SPOT:
  dx <freq> <call> <comment>      - Send a DX spot`;

export type SpotView = 'needed' | 'all';

export interface MonitorSnapshot {
    state: ConnectionState;
    status: string;
    endpoint: string;
    callsign: string;
    pendingCommands: number;
    solar: SolarUpdate | null;
    spotRate: number;
    buffer: BufferStats;
    resolver: ResolverStats;
    challenge: ChallengeStats;
    grids: GridStats;
    filter: SpotFilterOptions;
}

export interface EntityLookup {
    query: string;
    country: string | null;
    entityId: string | null;
    entityName: string | null;
    entity: EntityRecord | null;
    // Bands on which the entity is still needed for the Challenge
    neededBands: string[];
}

export interface NeededCheck {
    callsign: string;
    band: string;
    entityId: string | null;
    neededMultiBand: boolean;
    neededGrid: boolean;
}

export interface SpotMonitorOptions {
    socketFactory?: SocketFactory;
    now?: () => number;
}

const EXPIRY_CHECK_MS = 30000;

function isActive(state: ConnectionState): boolean {
    return state !== 'idle' && state !== 'stopped';
}

function linkSettings(config: Config): string {
    const { cluster, station } = config;
    return JSON.stringify([
        cluster.host,
        cluster.port,
        station.callsign.trim().toUpperCase(),
        cluster.loginCommands,
        cluster.reconnectDelaySeconds,
        cluster.connectTimeoutMs,
        cluster.bannerLines,
        cluster.bannerTimeoutMs,
    ]);
}

/**
 * Wires the cluster link, entity resolver, award tracker and spot buffer
 * together and exposes them to the web and MCP surfaces.
 *
 * Events:
 * - 'event' (ClusterEvent): everything the link reports
 * - 'rebuild' (ClassifiedSpot[]): the filtered spot view after a change
 * - 'awards' (AwardLoadResult): after award data was (re)loaded
 */
export class SpotMonitor extends EventEmitter {
    private config: Config;
    private readonly options: SpotMonitorOptions;
    private readonly context: ClassifierContext;
    private readonly buffer: SpotClassifierBuffer;
    private readonly loader: AwardDataLoader;
    private link: ClusterLink | null = null;
    private solar: SolarUpdate | null = null;
    private status: string = 'Not connected';
    private filter: SpotFilterOptions = {};

    constructor(config: Config, options: SpotMonitorOptions = {}) {
        super();
        this.config = config;
        this.options = options;
        this.context = { resolver: new EntityResolver(), tracker: new AwardTracker() };

        this.buffer = new SpotClassifierBuffer(this.context, {
            regularCapacity: config.display.maxSpots,
            neededTtlMs: config.display.neededSpotMinutes * 60 * 1000,
            gridAwardBand: config.awards.gridBand,
            rebuildIntervalMs: config.display.rebuildIntervalMs,
            now: options.now,
        });
        this.buffer.on('rebuild', (spots: ClassifiedSpot[]) => this.emit('rebuild', spots));
        this.applyFilter();

        this.loader = new AwardDataLoader(this.context.tracker, {
            challengePath: this.dataPath(config.data.challengePath),
            gridDataPath: this.dataPath(config.data.gridDataPath),
            eligibleGridsPath: this.dataPath(config.data.eligibleGridsPath),
        });
        this.loader.on('reloaded', (result: AwardLoadResult) => {
            this.buffer.requestRebuild();
            this.emit('awards', result);
        });
    }

    public async initialize(): Promise<void> {
        await this.context.resolver.loadFromFiles(
            this.dataPath(this.config.data.ctyPath),
            this.dataPath(this.config.data.dxccMappingPath)
        );
        await this.loader.load();
    }

    /** Start file watching and expiry, and the cluster link when auto-connect is on. */
    public start(): void {
        this.loader.watch(this.config.data.watchIntervalSeconds * 1000);
        this.buffer.startExpiry(EXPIRY_CHECK_MS);

        if (this.config.cluster.autoConnect) {
            this.connect();
        } else {
            console.log('Auto-connect disabled, cluster link idle');
        }
    }

    public async stop(): Promise<void> {
        this.loader.stop();
        this.buffer.stop();
        await this.disconnect();
    }

    /** Start the cluster link. False when no callsign is configured. */
    public connect(): boolean {
        const link = this.link ?? this.createLink();
        if (!link) return false;
        this.link = link;

        if (!isActive(link.getState())) {
            link.start();
        }
        return true;
    }

    public async disconnect(): Promise<void> {
        if (this.link) {
            await this.link.stop();
        }
    }

    /**
     * Apply a saved configuration. The needed-spot TTL and blocked lists take
     * effect on the next read; a change to the cluster endpoint, callsign or
     * login rebuilds the link and reconnects it if it was running.
     */
    public async applyConfig(config: Config): Promise<void> {
        const previous = this.config;
        this.config = config;

        this.buffer.setNeededTtl(config.display.neededSpotMinutes * 60 * 1000);
        this.applyFilter();

        if (this.link && linkSettings(previous) !== linkSettings(config)) {
            const link = this.link;
            const wasActive = isActive(link.getState());
            this.link = null;
            await link.stop();
            link.removeAllListeners();
            if (wasActive) {
                this.connect();
            }
        }
    }

    /** Queue a command for the cluster. Blank commands are rejected. */
    public sendCommand(text: string): void {
        const command = text.trim();
        if (!command) {
            throw new Error('Command is empty');
        }
        if (!this.link) {
            throw new Error('Cluster link is not running (no callsign configured?)');
        }
        this.link.send(command);
    }

    /** Display filter; the configured blocked spotters and prefixes always apply on top. */
    public setFilter(filter: SpotFilterOptions): void {
        this.filter = { ...filter };
        this.applyFilter();
    }

    public getFilter(): SpotFilterOptions {
        return { ...this.filter };
    }

    public getSpots(view: SpotView = 'all', filter?: SpotFilterOptions): ClassifiedSpot[] {
        const options = filter ? this.withBlocked(filter) : this.withBlocked(this.filter);
        const predicate = buildSpotFilter(options);
        const spots = view === 'needed' ? this.buffer.getNeeded() : this.buffer.view();
        return spots.filter(predicate);
    }

    /** Feed a spot straight into the buffer, as if the cluster had sent it. */
    public addSpot(spot: Spot): ClassifiedSpot {
        return this.buffer.add(spot);
    }

    public getSnapshot(): MonitorSnapshot {
        return {
            state: this.link?.getState() ?? 'idle',
            status: this.status,
            endpoint: `${this.config.cluster.host}:${this.config.cluster.port}`,
            callsign: this.config.station.callsign.toUpperCase(),
            pendingCommands: this.link?.getPendingCommands() ?? 0,
            solar: this.solar,
            spotRate: this.buffer.getSpotRate(),
            buffer: this.buffer.getStats(),
            resolver: this.context.resolver.getStats(),
            challenge: this.context.tracker.getChallengeStats(),
            grids: this.context.tracker.getGridStats(),
            filter: this.getFilter(),
        };
    }

    public getSolar(): SolarUpdate | null {
        return this.solar;
    }

    public async reloadAwards(): Promise<AwardLoadResult> {
        return this.loader.load();
    }

    /**
     * Import an award log and reload the award data from the file it wrote.
     * Grid imports keep only QSOs made from the station's own grid when one is
     * configured.
     */
    public async importAdif(adifPath: string, kind: AdifImportKind): Promise<ImportResult> {
        const outputPath = kind === 'challenge'
            ? this.dataPath(this.config.data.challengePath)
            : this.dataPath(this.config.data.gridDataPath);

        const eligible = this.context.tracker.getEligibleGrids();
        const result = await importAdifFile(this.resolveImportPath(adifPath), kind, outputPath, {
            band: this.config.awards.gridBand,
            homeGrid: this.config.station.grid || undefined,
            eligible: eligible.size > 0 ? eligible : undefined,
        });
        await this.loader.load();
        return result;
    }

    public lookupEntity(query: string): EntityLookup {
        const { resolver, tracker } = this.context;
        const normalized = query.trim().toUpperCase();
        const entityId = resolver.resolve(normalized);

        const neededBands: string[] = [];
        if (entityId !== null) {
            for (const { label } of BAND_PLAN) {
                // 60m does not count for the Challenge
                if (label === '60m') continue;
                if (tracker.isNeededMultiBand(entityId, label)) neededBands.push(label);
            }
        }

        return {
            query: normalized,
            country: resolver.countryForPrefix(normalized),
            entityId,
            entityName: entityId !== null ? resolver.entityName(entityId) : null,
            entity: resolver.entityForPrefix(normalized),
            neededBands,
        };
    }

    public checkNeeded(callsign: string, band: string, grid: string = ''): NeededCheck {
        const spot: Spot = {
            time: '',
            date: '',
            band: band.toLowerCase(),
            frequency: '',
            callsign: callsign.trim().toUpperCase(),
            prefix: '',
            grid: grid.trim().toUpperCase(),
            spotter: '',
            comment: '',
            receivedAt: Date.now(),
        };
        const classified = this.buffer.classify(spot);
        return {
            callsign: spot.callsign,
            band: normalizeBand(band),
            entityId: classified.entityId,
            neededMultiBand: classified.neededMultiBand,
            neededGrid: classified.neededGrid,
        };
    }

    private handleEvent(event: ClusterEvent): void {
        switch (event.type) {
            case 'spot':
                try {
                    this.buffer.add(event.spot);
                } catch (error) {
                    console.error(`Error classifying spot ${event.spot.callsign}:`, describeError(error));
                }
                break;
            case 'solar':
                this.solar = event.solar;
                break;
            case 'status':
                this.status = event.message;
                break;
            case 'command':
                break;
        }
        this.emit('event', event);
    }

    private createLink(): ClusterLink | null {
        const callsign = this.config.station.callsign.trim();
        if (!callsign) {
            this.status = 'No callsign configured, cluster link not started';
            console.warn(this.status);
            return null;
        }

        const link = new ClusterLink({
            host: this.config.cluster.host,
            port: this.config.cluster.port,
            callsign,
            loginCommands: this.config.cluster.loginCommands,
            reconnectDelayMs: this.config.cluster.reconnectDelaySeconds * 1000,
            connectTimeoutMs: this.config.cluster.connectTimeoutMs,
            bannerLines: this.config.cluster.bannerLines,
            bannerTimeoutMs: this.config.cluster.bannerTimeoutMs,
            socketFactory: this.options.socketFactory,
            now: this.options.now,
        });
        link.on('event', (event: ClusterEvent) => this.handleEvent(event));
        return link;
    }

    // Relative paths resolve against the import directory; nothing outside it is read
    private resolveImportPath(adifPath: string): string {
        const baseDir = path.resolve(this.config.data.importDir);
        const resolved = path.resolve(baseDir, adifPath);
        const relative = path.relative(baseDir, resolved);
        if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
            throw new Error(`ADIF file must be inside the import directory (${baseDir})`);
        }
        return resolved;
    }

    private withBlocked(filter: SpotFilterOptions): SpotFilterOptions {
        return {
            ...filter,
            blockedSpotters: [...this.config.display.blockedSpotters, ...(filter.blockedSpotters ?? [])],
            blockedPrefixes: [...this.config.display.blockedPrefixes, ...(filter.blockedPrefixes ?? [])],
        };
    }

    private applyFilter(): void {
        this.buffer.setFilter(this.withBlocked(this.filter));
    }

    private dataPath(file: string): string {
        return path.resolve(file);
    }
}
