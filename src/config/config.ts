import * as dotenv from 'dotenv';
import { Finality, PublicKey } from '@solana/web3.js';
import { ConfigurationError } from '../domain/errors';

// Load environment variables
dotenv.config();

export const DEFAULT_RPC_ENDPOINT = 'https://api.mainnet-beta.solana.com';
export const DEFAULT_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v'; // mainnet USDC
export const DEFAULT_STATE_FILE = '.burn-monitor-state.json';

export type OutputFormat = 'json' | 'text';

export interface BackoffConfig {
    baseDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
}

export interface Config {
    rpcEndpoint: string;
    mintAddress: string;
    commitment: Finality;
    pollIntervalMs: number;
    scanLimit: number;          // signatures per getSignaturesForAddress page
    dedupCapacity: number;
    backoff: BackoffConfig;
    stateFile: string | null;   // null = run stateless
    outputFormat: OutputFormat;
    discordWebhook: string;     // '' = no Discord sink
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
    const rpcEndpoint = readString(env, ['RPC_HTTP', 'RPC_URL'], DEFAULT_RPC_ENDPOINT);
    const mintAddress = readString(env, ['MINT_ADDRESS', 'USDC_MINT'], DEFAULT_MINT);

    const config: Config = {
        rpcEndpoint: parseEndpoint(rpcEndpoint),
        mintAddress: parseMint(mintAddress),
        commitment: parseCommitment(readString(env, ['COMMITMENT'], 'finalized')),
        pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', 10_000, 1),
        scanLimit: readInt(env, 'SCAN_LIMIT', 20, 1, 1000),
        dedupCapacity: readInt(env, 'DEDUP_CAPACITY', 10_000, 1),
        backoff: {
            baseDelayMs: readInt(env, 'BACKOFF_BASE_MS', 500, 1),
            maxDelayMs: readInt(env, 'BACKOFF_MAX_MS', 30_000, 1),
            multiplier: readFloat(env, 'BACKOFF_MULTIPLIER', 2),
        },
        stateFile: env.STATE_FILE === undefined ? DEFAULT_STATE_FILE : env.STATE_FILE.trim() || null,
        outputFormat: parseOutputFormat(readString(env, ['OUTPUT_FORMAT'], 'json')),
        discordWebhook: (env.DISCORD_WEBHOOK ?? '').trim(),
    };

    if (config.backoff.multiplier <= 1) {
        throw new ConfigurationError(`BACKOFF_MULTIPLIER must be greater than 1, got ${config.backoff.multiplier}`);
    }
    if (config.backoff.maxDelayMs < config.backoff.baseDelayMs) {
        throw new ConfigurationError(
            `BACKOFF_MAX_MS (${config.backoff.maxDelayMs}) must not be below BACKOFF_BASE_MS (${config.backoff.baseDelayMs})`
        );
    }
    return config;
}

function readString(env: Env, keys: string[], fallback: string): string {
    for (const key of keys) {
        const value = env[key]?.trim();
        if (value) return value;
    }
    return fallback;
}

function readInt(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) {
        throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
    }
    const value = parseInt(raw, 10);
    if (value < min || value > max) {
        throw new ConfigurationError(`${key} must be between ${min} and ${max}, got ${value}`);
    }
    return value;
}

function readFloat(env: Env, key: string, fallback: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}

function parseEndpoint(raw: string): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch (e) {
        throw new ConfigurationError(`RPC endpoint is not a valid URL: "${raw}"`, e);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError(`RPC endpoint must be http(s), got "${url.protocol}"`);
    }
    return raw;
}

function parseMint(raw: string): string {
    try {
        return new PublicKey(raw).toBase58();
    } catch (e) {
        throw new ConfigurationError(`Mint address is not a valid public key: "${raw}"`, e);
    }
}

function parseCommitment(raw: string): Finality {
    if (raw === 'confirmed' || raw === 'finalized') return raw;
    throw new ConfigurationError(`COMMITMENT must be "confirmed" or "finalized", got "${raw}"`);
}

function parseOutputFormat(raw: string): OutputFormat {
    if (raw === 'json' || raw === 'text') return raw;
    throw new ConfigurationError(`OUTPUT_FORMAT must be "json" or "text", got "${raw}"`);
}
