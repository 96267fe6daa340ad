import * as fs from 'node:fs/promises';
import path from 'node:path';

const SENSITIVE_ENV_KEYS = [
    'API_SECRET',
    'TELEGRAM_API_HASH',
    'TELEGRAM_BOT_TOKEN',
    'TELEGRAM_SESSION_PASSWORD',
];

const SENSITIVE_ASSIGNMENT =
    /\b(api[_-]?hash|api[_-]?secret|bot[_-]?token|token|secret|password|session[_-]?string)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi;

/** Minimum length for a raw value to be redacted verbatim; shorter values are too noisy to match. */
const MIN_REDACTABLE_LENGTH = 6;

const registeredValues = new Set<string>();

/** Resolve the directory that holds the daily markdown logs. */
export function getLogDir(): string {
    return path.resolve(process.env.RELAYDESK_LOG_DIR ?? 'memory');
}

/** Path of the markdown log for the given day (UTC). */
export function getDailyLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Register a secret loaded from somewhere other than the environment
 * (for instance `relaydesk.json`) so it is redacted from logs and API errors.
 */
export function registerSensitiveValue(value: string | null | undefined): void {
    if (typeof value === 'string' && value.trim().length >= MIN_REDACTABLE_LENGTH) {
        registeredValues.add(value.trim());
    }
}

export function clearSensitiveValuesForTests(): void {
    registeredValues.clear();
}

/** Replace known secret values and `key=value` credentials with `[REDACTED]`. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    const values = new Set(registeredValues);
    for (const key of SENSITIVE_ENV_KEYS) {
        const envValue = process.env[key];
        if (envValue && envValue.trim().length >= MIN_REDACTABLE_LENGTH) {
            values.add(envValue.trim());
        }
    }

    for (const value of values) {
        scrubbed = scrubbed.split(value).join('[REDACTED]');
    }

    return scrubbed.replace(SENSITIVE_ASSIGNMENT, (_match, key: string) => `${key}=[REDACTED]`);
}

/**
 * Append a timestamped entry to today's markdown log.
 * Logging failures are reported to stderr and never thrown.
 */
export async function logThought(thought: string): Promise<void> {
    const timestamp = new Date().toISOString();
    const entry = `\n## Thought @ ${timestamp}\n${scrubSensitiveText(thought)}\n`;
    const logPath = getDailyLogPath();

    try {
        await fs.mkdir(path.dirname(logPath), { recursive: true });
        await fs.appendFile(logPath, entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to append to ${logPath}: ${message}`);
    }
}
