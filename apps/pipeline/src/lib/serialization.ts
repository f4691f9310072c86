import type { Json } from '../types/sources';

function isPlainObject(value: object): value is Record<string, unknown> {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

// Converts a derived row to a JSON-safe value for jsonb columns.
// BigInts become strings to keep precision; Dates become ISO strings.
export const toJSON = (data: unknown): Json => {
    if (data === null || data === undefined) {
        return null;
    }

    if (typeof data === 'bigint') {
        return data.toString();
    }

    if (typeof data === 'number') {
        return Number.isFinite(data) ? data : null;
    }

    if (typeof data === 'string' || typeof data === 'boolean') {
        return data;
    }

    if (Array.isArray(data)) {
        return data.map(toJSON);
    }

    if (data instanceof Date) {
        return data.toISOString();
    }

    if (data instanceof Set) {
        return [...data].map(toJSON);
    }

    if (typeof data === 'object' && isPlainObject(data)) {
        const out: { [key: string]: Json } = {};
        for (const [key, value] of Object.entries(data)) {
            // Absent keys stay absent, like JSON.stringify
            if (value !== undefined) out[key] = toJSON(value);
        }
        return out;
    }

    throw new Error(`Cannot serialize value of type ${typeof data}`);
};
