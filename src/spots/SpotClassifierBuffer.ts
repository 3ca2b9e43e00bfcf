import { EventEmitter } from 'events';
import type { Spot } from '../cluster/types';
import { normalizeBand } from '../awards/AwardTracker';
import type { AwardTracker } from '../awards/AwardTracker';
import type { EntityResolver } from '../dxcc/EntityResolver';
import { RebuildThrottle } from './RebuildThrottle';
import { buildSpotFilter } from './SpotFilter';
import type { SpotFilterOptions, SpotPredicate } from './SpotFilter';
import type { BufferStats, ClassifiedSpot } from './types';

export interface ClassifierContext {
    resolver: EntityResolver;
    tracker: AwardTracker;
}

export interface SpotBufferOptions {
    regularCapacity?: number;
    neededTtlMs?: number;
    gridAwardBand?: string;
    rebuildIntervalMs?: number;
    now?: () => number;
}

interface BufferEntry {
    spot: Spot;
    insertedAt: number;
}

export const DEFAULT_REGULAR_CAPACITY = 500;
export const DEFAULT_NEEDED_TTL_MS = 15 * 60 * 1000;
export const SPOT_RATE_WINDOW_MS = 60 * 1000;

/**
 * Two buffers of received spots, newest first:
 * - needed: spots that would fill an award slot, one per (callsign, band),
 *   dropped once older than the TTL
 * - regular: everything else, capped by count
 *
 * Classification is redone on every read so an award reload shows at once.
 * Emits 'rebuild' (ClassifiedSpot[]) with the filtered view, throttled.
 */
export class SpotClassifierBuffer extends EventEmitter {
    private readonly context: ClassifierContext;
    private readonly regularCapacity: number;
    private readonly gridAwardBand: string;
    private readonly now: () => number;
    private readonly throttle: RebuildThrottle;

    private neededTtlMs: number;
    private needed: BufferEntry[] = [];
    private regular: BufferEntry[] = [];
    private arrivals: number[] = [];
    private filter: SpotFilterOptions = {};
    private predicate: SpotPredicate = buildSpotFilter();
    private expiryInterval: NodeJS.Timeout | null = null;

    constructor(context: ClassifierContext, options: SpotBufferOptions = {}) {
        super();
        this.context = context;
        this.regularCapacity = options.regularCapacity ?? DEFAULT_REGULAR_CAPACITY;
        this.neededTtlMs = options.neededTtlMs ?? DEFAULT_NEEDED_TTL_MS;
        this.gridAwardBand = normalizeBand(options.gridAwardBand ?? '6M');
        this.now = options.now ?? Date.now;
        this.throttle = new RebuildThrottle(() => this.emitRebuild(), options.rebuildIntervalMs ?? 2000, this.now);
    }

    public classify(spot: Spot): ClassifiedSpot {
        const { resolver, tracker } = this.context;
        // Some nodes leave the prefix field empty; the callsign itself resolves by shortening
        const entityId = resolver.resolve(spot.prefix || spot.callsign);
        const neededMultiBand = tracker.isNeededMultiBand(entityId, spot.band);
        const neededGrid = normalizeBand(spot.band) === this.gridAwardBand && tracker.isNeededGrid(spot.grid);
        return { spot, entityId, neededMultiBand, neededGrid };
    }

    public add(spot: Spot): ClassifiedSpot {
        const classified = this.classify(spot);
        const now = this.now();
        this.recordArrival(now);

        if (classified.neededMultiBand || classified.neededGrid) {
            const callsign = spot.callsign.toUpperCase();
            const band = normalizeBand(spot.band);
            this.needed = this.needed.filter(entry =>
                entry.spot.callsign.toUpperCase() !== callsign || normalizeBand(entry.spot.band) !== band
            );
            this.needed.unshift({ spot, insertedAt: now });
        } else {
            this.regular.unshift({ spot, insertedAt: now });
            if (this.regular.length > this.regularCapacity) {
                this.regular.length = this.regularCapacity;
            }
        }

        this.throttle.request();
        return classified;
    }

    public getNeeded(): ClassifiedSpot[] {
        this.evictExpired();
        return this.needed.map(entry => this.classify(entry.spot));
    }

    public getRegular(): ClassifiedSpot[] {
        return this.regular.map(entry => this.classify(entry.spot));
    }

    /** Needed spots first, then regular ones, each newest first. */
    public view(predicate?: SpotPredicate): ClassifiedSpot[] {
        const all = [...this.getNeeded(), ...this.getRegular()];
        return predicate ? all.filter(predicate) : all;
    }

    /** The view under the filter set with setFilter(). */
    public filteredView(): ClassifiedSpot[] {
        return this.view(this.predicate);
    }

    public setNeededTtl(ttlMs: number): void {
        this.neededTtlMs = ttlMs;
    }

    public getNeededTtl(): number {
        return this.neededTtlMs;
    }

    public setFilter(filter: SpotFilterOptions): void {
        this.filter = { ...filter };
        this.predicate = buildSpotFilter(this.filter);
        this.throttle.request();
    }

    public getFilter(): SpotFilterOptions {
        return { ...this.filter };
    }

    /** Ask for a rebuild, e.g. after award data changed. */
    public requestRebuild(): void {
        this.throttle.request();
    }

    public getSpotRate(): number {
        this.pruneArrivals(this.now());
        return this.arrivals.length;
    }

    public getStats(): BufferStats {
        this.evictExpired();
        return {
            needed: this.needed.length,
            regular: this.regular.length,
            spotRate: this.getSpotRate(),
        };
    }

    /** Periodically drop expired needed spots and rebuild when any went. */
    public startExpiry(intervalMs: number): void {
        this.stop();
        this.expiryInterval = setInterval(() => {
            if (this.evictExpired() > 0) {
                this.throttle.request();
            }
        }, intervalMs);
    }

    public stop(): void {
        if (this.expiryInterval) {
            clearInterval(this.expiryInterval);
            this.expiryInterval = null;
        }
        this.throttle.cancel();
    }

    public clear(): void {
        this.needed = [];
        this.regular = [];
        this.arrivals = [];
        this.throttle.request();
    }

    private evictExpired(): number {
        const now = this.now();
        const before = this.needed.length;
        this.needed = this.needed.filter(entry => now - entry.insertedAt <= this.neededTtlMs);
        return before - this.needed.length;
    }

    private recordArrival(now: number): void {
        this.arrivals.push(now);
        this.pruneArrivals(now);
    }

    private pruneArrivals(now: number): void {
        const cutoff = now - SPOT_RATE_WINDOW_MS;
        let drop = 0;
        while (drop < this.arrivals.length && this.arrivals[drop] <= cutoff) {
            drop++;
        }
        if (drop > 0) {
            this.arrivals = this.arrivals.slice(drop);
        }
    }

    private emitRebuild(): void {
        this.emit('rebuild', this.filteredView());
    }
}
