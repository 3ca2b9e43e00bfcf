import { EventEmitter } from 'events';
import fs from 'fs/promises';
import { z } from 'zod';
import { AwardTracker } from './AwardTracker';
import { describeError } from '../util/abort';

export const ChallengeFileSchema = z.object({
    raw_band_entity_pairs: z.array(z.tuple([z.string(), z.union([z.string(), z.number()])])),
});

export const WorkedGridFileSchema = z.object({
    worked_grids: z.record(z.object({
        call: z.string().default(''),
        date: z.string().default('Unknown'),
    })),
});

export const EligibleGridFileSchema = z.array(z.string());

export interface AwardDataPaths {
    challengePath: string;
    gridDataPath: string;
    eligibleGridsPath: string;
}

export interface AwardLoadResult {
    challenge: boolean;
    workedGrids: boolean;
    eligibleGrids: boolean;
}

/** Missing file -> null, unreadable or invalid file -> thrown error. */
async function readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return null;
        }
        throw error;
    }

    const result = schema.safeParse(JSON.parse(text));
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(`${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return result.data;
}

async function modifiedAt(filePath: string): Promise<number> {
    try {
        const stats = await fs.stat(filePath);
        return stats.mtimeMs;
    } catch {
        return -1;
    }
}

/**
 * Loads the award JSON files into an AwardTracker and reloads them when they
 * change on disk. A file that is missing or fails validation leaves its set
 * empty; the other sets still load.
 *
 * Emits 'reloaded' (AwardLoadResult) after every load.
 */
export class AwardDataLoader extends EventEmitter {
    private readonly tracker: AwardTracker;
    private readonly paths: AwardDataPaths;
    private mtimes: Map<string, number> = new Map();
    private watchInterval: NodeJS.Timeout | null = null;
    private checking: boolean = false;

    constructor(tracker: AwardTracker, paths: AwardDataPaths) {
        super();
        this.tracker = tracker;
        this.paths = paths;
    }

    public async load(): Promise<AwardLoadResult> {
        const { challengePath, gridDataPath, eligibleGridsPath } = this.paths;

        for (const filePath of [challengePath, gridDataPath, eligibleGridsPath]) {
            this.mtimes.set(filePath, await modifiedAt(filePath));
        }

        const challenge = await this.loadFile(challengePath, ChallengeFileSchema, 'Challenge data');
        this.tracker.loadChallenge(challenge?.raw_band_entity_pairs ?? []);

        const worked = await this.loadFile(gridDataPath, WorkedGridFileSchema, 'Worked grid data');
        this.tracker.loadWorkedGrids(worked?.worked_grids ?? {});

        const eligible = await this.loadFile(eligibleGridsPath, EligibleGridFileSchema, 'Eligible grid list');
        this.tracker.loadEligibleGrids(eligible ?? []);

        const challengeStats = this.tracker.getChallengeStats();
        const gridStats = this.tracker.getGridStats();
        console.log(`Award data: ${challengeStats.totalSlots} Challenge slots, ${gridStats.worked}/${gridStats.eligible} grids worked`);

        const result: AwardLoadResult = {
            challenge: challenge !== null,
            workedGrids: worked !== null,
            eligibleGrids: eligible !== null,
        };
        this.emit('reloaded', result);
        return result;
    }

    /** Poll the files' modification times and reload when any of them changes. */
    public watch(intervalMs: number): void {
        this.stop();
        if (intervalMs <= 0) return;

        this.watchInterval = setInterval(() => {
            this.checkForUpdates().catch(error => {
                console.error('Error checking award data files:', describeError(error));
            });
        }, intervalMs);
    }

    public stop(): void {
        if (this.watchInterval) {
            clearInterval(this.watchInterval);
            this.watchInterval = null;
        }
    }

    public async checkForUpdates(): Promise<boolean> {
        if (this.checking) return false;
        this.checking = true;

        try {
            for (const [filePath, known] of this.mtimes) {
                if ((await modifiedAt(filePath)) !== known) {
                    console.log('Award data file changed, reloading...');
                    await this.load();
                    return true;
                }
            }
            return false;
        } finally {
            this.checking = false;
        }
    }

    private async loadFile<T>(
        filePath: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        label: string
    ): Promise<T | null> {
        try {
            const data = await readJson(filePath, schema);
            if (data === null) {
                console.log(`${label} not found: ${filePath}`);
            }
            return data;
        } catch (error) {
            console.warn(`${label} ignored (${filePath}): ${describeError(error)}`);
            return null;
        }
    }
}
