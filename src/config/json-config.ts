import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { registerSensitiveValue } from '../utils/logger.js';

export interface RelayDeskConfig {
    runtime: {
        /** `null` leaves the worker runtime unbounded. */
        maxConcurrentJobs: number | null;
        drainGraceMs: number;
        awaitTimeoutMs: number;
        retentionMaxJobs: number;
        retentionMaxAgeMs: number;
        retentionSweepCron: string;
        historyLimit: number;
    };
    rateLimit: {
        minDelayMs: number;
        maxDelayMs: number;
        jitterMs: number;
        maxBulkItems: number;
    };
    retry: {
        maxAttempts: number;
        baseDelayMs: number;
        backoffFactor: number;
        maxDelayMs: number;
    };
    telegram: {
        apiId: number | null;
        apiHash: string;
    };
    notifications: {
        enabled: boolean;
        botToken: string;
        chatId: string;
    };
    api: {
        port: number;
        secret: string;
    };
}

export const DEFAULT_CONFIG: RelayDeskConfig = {
    runtime: {
        maxConcurrentJobs: null,
        drainGraceMs: 5_000,
        awaitTimeoutMs: 120_000,
        retentionMaxJobs: 500,
        retentionMaxAgeMs: 24 * 60 * 60 * 1000,
        retentionSweepCron: '*/5 * * * *',
        historyLimit: 5_000,
    },
    rateLimit: {
        minDelayMs: 2_000,
        maxDelayMs: 10_000,
        jitterMs: 500,
        maxBulkItems: 200,
    },
    retry: {
        maxAttempts: 3,
        baseDelayMs: 1_000,
        backoffFactor: 2,
        maxDelayMs: 15_000,
    },
    telegram: {
        apiId: null,
        apiHash: '',
    },
    notifications: {
        enabled: false,
        botToken: '',
        chatId: '',
    },
    api: {
        port: 3200,
        secret: '',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.RELAYDESK_CONFIG_PATH) {
        return path.resolve(process.env.RELAYDESK_CONFIG_PATH);
    }
    return path.resolve('relaydesk.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<RelayDeskConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`);
    }
}

export async function writeConfig(config: RelayDeskConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        if (existsSync(tempPath)) {
            await fs.unlink(tempPath).catch((cleanupError: unknown) => {
                console.warn(`[RelayDesk Config] Could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
            });
        }
        throw new Error(`Failed to save config to ${targetPath}: ${errorMessage(error)}`);
    }
    cachedConfig = null;
}

export function mergeWithDefaults(loaded: unknown): RelayDeskConfig {
    const config = cloneConfig(DEFAULT_CONFIG);
    if (!isRecord(loaded)) return config;

    const runtime = section(loaded, 'runtime');
    config.runtime = {
        maxConcurrentJobs: runtime.maxConcurrentJobs === null
            ? null
            : numberOr(runtime.maxConcurrentJobs, config.runtime.maxConcurrentJobs),
        drainGraceMs: numberOr(runtime.drainGraceMs, config.runtime.drainGraceMs),
        awaitTimeoutMs: numberOr(runtime.awaitTimeoutMs, config.runtime.awaitTimeoutMs),
        retentionMaxJobs: numberOr(runtime.retentionMaxJobs, config.runtime.retentionMaxJobs),
        retentionMaxAgeMs: numberOr(runtime.retentionMaxAgeMs, config.runtime.retentionMaxAgeMs),
        retentionSweepCron: stringOr(runtime.retentionSweepCron, config.runtime.retentionSweepCron),
        historyLimit: numberOr(runtime.historyLimit, config.runtime.historyLimit),
    };

    const rateLimit = section(loaded, 'rateLimit');
    config.rateLimit = {
        minDelayMs: numberOr(rateLimit.minDelayMs, config.rateLimit.minDelayMs),
        maxDelayMs: numberOr(rateLimit.maxDelayMs, config.rateLimit.maxDelayMs),
        jitterMs: numberOr(rateLimit.jitterMs, config.rateLimit.jitterMs),
        maxBulkItems: numberOr(rateLimit.maxBulkItems, config.rateLimit.maxBulkItems),
    };

    const retry = section(loaded, 'retry');
    config.retry = {
        maxAttempts: numberOr(retry.maxAttempts, config.retry.maxAttempts),
        baseDelayMs: numberOr(retry.baseDelayMs, config.retry.baseDelayMs),
        backoffFactor: numberOr(retry.backoffFactor, config.retry.backoffFactor),
        maxDelayMs: numberOr(retry.maxDelayMs, config.retry.maxDelayMs),
    };

    const telegram = section(loaded, 'telegram');
    config.telegram = {
        apiId: numberOr(telegram.apiId, config.telegram.apiId),
        apiHash: stringOr(telegram.apiHash, config.telegram.apiHash),
    };

    const notifications = section(loaded, 'notifications');
    config.notifications = {
        enabled: typeof notifications.enabled === 'boolean' ? notifications.enabled : config.notifications.enabled,
        botToken: stringOr(notifications.botToken, config.notifications.botToken),
        chatId: typeof notifications.chatId === 'number'
            ? String(notifications.chatId)
            : stringOr(notifications.chatId, config.notifications.chatId),
    };

    const api = section(loaded, 'api');
    config.api = {
        port: numberOr(api.port, config.api.port),
        secret: stringOr(api.secret, config.api.secret),
    };

    return config;
}

// ── Flat key access with environment overrides ──────────────────────────────

const CONFIG_KEYS = {
    API_SECRET: (config: RelayDeskConfig) => config.api.secret,
    API_PORT: (config: RelayDeskConfig) => config.api.port,
    TELEGRAM_API_ID: (config: RelayDeskConfig) => config.telegram.apiId,
    TELEGRAM_API_HASH: (config: RelayDeskConfig) => config.telegram.apiHash,
    TELEGRAM_BOT_TOKEN: (config: RelayDeskConfig) => config.notifications.botToken,
    TELEGRAM_NOTIFY_CHAT_ID: (config: RelayDeskConfig) => config.notifications.chatId,
    RATE_LIMIT_MIN_DELAY_MS: (config: RelayDeskConfig) => config.rateLimit.minDelayMs,
    RATE_LIMIT_MAX_DELAY_MS: (config: RelayDeskConfig) => config.rateLimit.maxDelayMs,
    RATE_LIMIT_JITTER_MS: (config: RelayDeskConfig) => config.rateLimit.jitterMs,
    MAX_BULK_ITEMS: (config: RelayDeskConfig) => config.rateLimit.maxBulkItems,
    MAX_CONCURRENT_JOBS: (config: RelayDeskConfig) => config.runtime.maxConcurrentJobs,
} satisfies Record<string, (config: RelayDeskConfig) => unknown>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

let cachedConfig: RelayDeskConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

/** Synchronously (re)load `relaydesk.json`; a broken file falls back to defaults with an error log. */
export function reloadConfigSync(): RelayDeskConfig {
    const configPath = getConfigPath();
    let loaded = mergeWithDefaults({});
    try {
        if (existsSync(configPath)) {
            loaded = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
        }
    } catch (error) {
        console.error(`[RelayDesk Config] Failed to parse JSON config at ${configPath}:`, errorMessage(error));
    }
    cachedConfig = loaded;
    registerSensitiveValue(loaded.api.secret);
    registerSensitiveValue(loaded.telegram.apiHash);
    registerSensitiveValue(loaded.notifications.botToken);
    return loaded;
}

/** A configured value: a non-empty environment variable wins over `relaydesk.json`. */
export function getConfigValue(key: ConfigKey): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const config = cachedConfig ?? reloadConfigSync();
    const jsonValue = CONFIG_KEYS[key](config);
    if (jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }
    return undefined;
}

/** The JSON config with every environment override applied. */
export function resolveConfig(): RelayDeskConfig {
    const config = cloneConfig(cachedConfig ?? reloadConfigSync());

    config.api.secret = getConfigValue('API_SECRET') ?? '';
    config.api.port = parseNumber(getConfigValue('API_PORT'), config.api.port);
    config.telegram.apiId = parseNumber(getConfigValue('TELEGRAM_API_ID'), config.telegram.apiId);
    config.telegram.apiHash = getConfigValue('TELEGRAM_API_HASH') ?? '';
    config.notifications.botToken = getConfigValue('TELEGRAM_BOT_TOKEN') ?? '';
    config.notifications.chatId = getConfigValue('TELEGRAM_NOTIFY_CHAT_ID') ?? '';
    config.rateLimit.minDelayMs = parseNumber(getConfigValue('RATE_LIMIT_MIN_DELAY_MS'), config.rateLimit.minDelayMs);
    config.rateLimit.maxDelayMs = parseNumber(getConfigValue('RATE_LIMIT_MAX_DELAY_MS'), config.rateLimit.maxDelayMs);
    config.rateLimit.jitterMs = parseNumber(getConfigValue('RATE_LIMIT_JITTER_MS'), config.rateLimit.jitterMs);
    config.rateLimit.maxBulkItems = parseNumber(getConfigValue('MAX_BULK_ITEMS'), config.rateLimit.maxBulkItems);
    config.runtime.maxConcurrentJobs = parseNumber(
        getConfigValue('MAX_CONCURRENT_JOBS'),
        config.runtime.maxConcurrentJobs,
    );

    registerSensitiveValue(config.api.secret);
    registerSensitiveValue(config.telegram.apiHash);
    registerSensitiveValue(config.notifications.botToken);
    return config;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function cloneConfig(config: RelayDeskConfig): RelayDeskConfig {
    return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isRecord(value) ? value : {};
}

function numberOr<T extends number | null>(value: unknown, fallback: T): number | T {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function parseNumber<T extends number | null>(value: string | undefined, fallback: T): number | T {
    if (value === undefined) return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
