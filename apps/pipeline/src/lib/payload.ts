// Helpers for reading loosely shaped JSON payloads stored by the ingestion jobs

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const YEAR_PATTERN = /^\d{4}/;

export type JsonPath = ReadonlyArray<string | number>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function jsonGet(value: unknown, path: JsonPath): unknown {
    let current = value;
    for (const segment of path) {
        if (typeof segment === 'number') {
            if (!Array.isArray(current)) return undefined;
            current = current[segment];
        } else {
            if (!isRecord(current)) return undefined;
            current = current[segment];
        }
    }
    return current;
}

// Text at a path; blank strings read as null, single-item tag lists are unwrapped
export function jsonText(value: unknown, path: JsonPath): string | null {
    let found = jsonGet(value, path);
    if (Array.isArray(found)) found = found[0];

    if (typeof found === 'string') {
        const trimmed = found.trim();
        return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof found === 'number' && Number.isFinite(found)) return String(found);
    if (typeof found === 'boolean') return String(found);
    return null;
}

export function jsonNumber(value: unknown, path: JsonPath): number | null {
    const text = jsonText(value, path);
    if (text === null) return null;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
}

export function jsonInt(value: unknown, path: JsonPath): number | null {
    const parsed = jsonNumber(value, path);
    return parsed === null ? null : Math.trunc(parsed);
}

export function jsonBool(value: unknown, path: JsonPath): boolean {
    return jsonText(value, path) === 'true';
}

export function jsonArray(value: unknown, path: JsonPath): unknown[] {
    const found = jsonGet(value, path);
    return Array.isArray(found) ? found : [];
}

// Unix seconds to Date
export function jsonTimestamp(value: unknown, path: JsonPath): Date | null {
    const seconds = jsonInt(value, path);
    return seconds === null ? null : new Date(seconds * 1000);
}

export function tryCastUuid(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const candidate = value.trim().toLowerCase();
    return UUID_PATTERN.test(candidate) ? candidate : null;
}

export function extractYear(date: string | null): number | null {
    if (date === null) return null;
    const match = YEAR_PATTERN.exec(date);
    return match ? Number(match[0]) : null;
}

// Distinct valid uuids in first-seen order
export function uuidList(values: readonly unknown[]): string[] {
    const seen = new Set<string>();
    for (const value of values) {
        const uuid = tryCastUuid(value);
        if (uuid !== null) seen.add(uuid);
    }
    return [...seen];
}
