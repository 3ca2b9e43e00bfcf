import type { Spot } from '../cluster/types';

export interface ClassifiedSpot {
    spot: Spot;
    entityId: string | null;
    neededMultiBand: boolean;
    neededGrid: boolean;
}

export interface BufferStats {
    needed: number;
    regular: number;
    spotRate: number;           // Spots received in the last minute
}
