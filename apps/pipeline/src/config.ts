import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import defaults from '../config/pipeline.json';
import { InvalidPipelineConfigError } from './lib/errors';
import { pipelineLoggers } from './lib/logger';

const log = pipelineLoggers.config;

// Label used in errors about the shipped defaults
const DEFAULTS_SOURCE = 'config/pipeline.json';

const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();
const topK = positiveInt.nullable();

const revisitReleasesSchema = z
    .object({
        minLifetimeListens: positiveInt,
        minRecordings: positiveInt,
        maxRecordings: positiveInt,
        maxRecentListens: nonNegative,
        minOldListens: nonNegative,
        oldListensPerRecording: nonNegative,
        minRevisitScore: nonNegative,
    })
    .strict()
    .refine((value) => value.minRecordings <= value.maxRecordings, {
        message: 'minRecordings must not exceed maxRecordings',
    });

const revisitTracksSchema = z
    .object({
        minLifetimeListens: positiveInt,
        maxRecentListens: nonNegative,
        minOldListens: nonNegative,
        minRevisitScore: nonNegative,
    })
    .strict();

export const pipelineConfigSchema = z
    .object({
        identity: z
            .object({
                // Library folders known to be absent from the catalog; only their own tags are trusted
                excludedPathPrefixes: z.array(z.string().min(1)),
            })
            .strict(),
        scoring: z
            .object({
                decayRate: z.number().positive(),
                windowDays: z.array(positiveInt).min(1),
            })
            .strict(),
        revisit: z
            .object({
                recentWindowDays: positiveInt,
                releases: revisitReleasesSchema,
                tracks: revisitTracksSchema,
            })
            .strict(),
        fileListenCounts: z.object({ windowDays: z.array(positiveInt) }).strict(),
        similarUserRecommends: z.object({ topK }).strict(),
        freshReleases: z
            .object({
                maxArtistListens: nonNegative,
                topK,
            })
            .strict(),
        artistRecommends: z
            .object({
                knownArtistMinListens: nonNegative,
                listenerTopN: z.number().int().nonnegative(),
                catalogTopN: z.number().int().nonnegative(),
                collaborativeWeight: nonNegative,
                collaborativeTimeRange: z.string().min(1),
                topK,
            })
            .strict(),
        libraryAdditions: z.object({ topK }).strict(),
        collections: z
            .object({
                reservedNames: z.array(z.string().min(1)),
                minPlaylistCount: positiveInt,
            })
            .strict(),
        spikes: z
            .object({
                minListens: positiveInt,
                periodHours: positiveInt,
            })
            .strict(),
        unmappedListens: z.object({ windowDays: positiveInt }).strict(),
        dailyStats: z.object({ windowDays: positiveInt }).strict(),
    })
    .strict()
    .refine((value) => value.scoring.windowDays.includes(value.revisit.recentWindowDays), {
        message: 'revisit.recentWindowDays must be one of scoring.windowDays',
        path: ['revisit', 'recentWindowDays'],
    });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Objects merge key by key; arrays and scalars from the override replace the base
export function mergeConfig(base: unknown, override: unknown): unknown {
    if (!isObject(base) || !isObject(override)) {
        return override === undefined ? base : override;
    }
    const merged: JsonObject = { ...base };
    for (const [key, value] of Object.entries(override)) {
        merged[key] = mergeConfig(base[key], value);
    }
    return merged;
}

function readJson(path: string): unknown {
    try {
        return JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidPipelineConfigError(path, [reason]);
    }
}

export function parsePipelineConfig(raw: unknown, source = 'inline'): PipelineConfig {
    const parsed = pipelineConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new InvalidPipelineConfigError(source, issues);
    }
    return parsed.data;
}

export function defaultPipelineConfig(): PipelineConfig {
    return parsePipelineConfig(defaults, DEFAULTS_SOURCE);
}

export function loadPipelineConfig(overridePath?: string): PipelineConfig {
    if (!overridePath) {
        return defaultPipelineConfig();
    }

    const path = resolve(overridePath);
    const config = parsePipelineConfig(mergeConfig(defaults, readJson(path)), path);
    log.info({ path }, 'Loaded pipeline config overrides');
    return config;
}

// Test and script helper: defaults with an in-memory override
export function withOverrides(overrides: unknown): PipelineConfig {
    return parsePipelineConfig(mergeConfig(defaults, overrides));
}
