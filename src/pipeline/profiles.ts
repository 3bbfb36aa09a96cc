import fs from 'fs-extra';
import { ENV, splitArgs } from './env';
import { ConfigurationError } from './errors';
import { debug } from './log';
import {
    type ConfigOverrides,
    parseBreakPolicy,
    parseChunkErrorPolicy,
    parseMode,
    parseTextJoin,
} from './config';

/** Named presets of pipeline options, e.g. one per model family. */
export type ProfileMap = Record<string, ConfigOverrides>;

export const DEFAULT_PROFILE = 'default';

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(profile: string, raw: JsonObject, key: string): JsonObject {
    const v = raw[key];
    if (v === undefined) return {};
    if (!isObject(v)) {
        throw new ConfigurationError(`Profile ${profile}: "${key}" must be an object`);
    }
    return v;
}

function num(profile: string, raw: JsonObject, key: string): number | undefined {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number' || !Number.isFinite(v)) {
        throw new ConfigurationError(`Profile ${profile}: "${key}" must be a number`);
    }
    return v;
}

function str(profile: string, raw: JsonObject, key: string): string | undefined {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'string') {
        throw new ConfigurationError(`Profile ${profile}: "${key}" must be a string`);
    }
    return v;
}

// Either a list of arguments or one space-separated string.
function args(profile: string, raw: JsonObject, key: string): string[] | undefined {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (typeof v === 'string') return splitArgs(v);
    if (Array.isArray(v) && v.every((a): a is string => typeof a === 'string')) {
        return v;
    }
    throw new ConfigurationError(`Profile ${profile}: "${key}" must be a string or a list of strings`);
}

function parseProfile(name: string, raw: unknown): ConfigOverrides {
    if (!isObject(raw)) {
        throw new ConfigurationError(`Profile ${name} must be an object`);
    }
    const vad = section(name, raw, 'vad');
    const window = section(name, raw, 'window');
    const segments = section(name, raw, 'segments');
    const engine = section(name, raw, 'engine');
    const mode = str(name, raw, 'mode');
    const onChunkError = str(name, raw, 'onChunkError');
    const breakPolicy = str(name, segments, 'breakPolicy');
    const join = str(name, segments, 'join');
    return {
        mode: mode === undefined ? undefined : parseMode(mode),
        sampleRate: num(name, raw, 'sampleRate'),
        model: str(name, raw, 'model'),
        language: str(name, raw, 'language'),
        onChunkError: onChunkError === undefined ? undefined : parseChunkErrorPolicy(onChunkError),
        chunkTimeoutSec: num(name, raw, 'chunkTimeoutSec'),
        vad: {
            minSpeechMs: num(name, vad, 'minSpeechMs'),
            minSilenceMs: num(name, vad, 'minSilenceMs'),
            mergeGap: num(name, vad, 'mergeGap'),
            maxChunk: num(name, vad, 'maxChunk'),
            splitGap: num(name, vad, 'splitGap'),
        },
        window: {
            chunkDuration: num(name, window, 'chunkDuration'),
            overlap: num(name, window, 'overlap'),
        },
        segments: {
            gapThreshold: num(name, segments, 'gapThreshold'),
            maxDuration: num(name, segments, 'maxDuration'),
            breakPolicy: breakPolicy === undefined ? undefined : parseBreakPolicy(breakPolicy),
            join: join === undefined ? undefined : parseTextJoin(join),
        },
        engine: {
            bin: str(name, engine, 'bin'),
            args: args(name, engine, 'args'),
        },
    };
}

export function parseProfiles(raw: unknown): ProfileMap {
    if (!isObject(raw)) {
        throw new ConfigurationError('Profiles file must contain an object of named profiles');
    }
    const profiles: ProfileMap = { [DEFAULT_PROFILE]: {} };
    for (const [name, value] of Object.entries(raw)) {
        profiles[name] = parseProfile(name, value);
    }
    return profiles;
}

export async function loadProfiles(file: string = ENV.profilesFile): Promise<ProfileMap> {
    if (!(await fs.pathExists(file))) {
        debug('profiles.missing', { file });
        return { [DEFAULT_PROFILE]: {} };
    }
    let raw: unknown;
    try {
        raw = await fs.readJson(file);
    } catch (e) {
        throw new ConfigurationError(`Profiles file ${file} is not valid JSON`, {
            file,
            error: e instanceof Error ? e.message : String(e),
        });
    }
    return parseProfiles(raw);
}

export function selectProfile(profiles: ProfileMap, name: string = DEFAULT_PROFILE): ConfigOverrides {
    if (!Object.hasOwn(profiles, name)) {
        throw new ConfigurationError(`Unknown profile: ${name}`, {
            available: Object.keys(profiles).join(', '),
        });
    }
    return profiles[name];
}
