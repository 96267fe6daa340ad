/**
 * Lenient readers for JSON request bodies. A missing or mistyped field becomes
 * an empty value, which the dispatcher's validation then rejects with a hint.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function field(body: unknown, key: string): unknown {
    return isRecord(body) ? body[key] : undefined;
}

export function asString(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

export function asOptionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return Number.NaN;
}

export function asStringList(value: unknown): string[] {
    return Array.isArray(value) ? value.map(asString) : [];
}
