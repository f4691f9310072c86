// Small relational helpers the models are written with

export type SortValue = string | number | Date | null;
export type SortKey<T> = {
    value: (row: T) => SortValue;
    desc?: boolean;
};

const DAY_MS = 24 * 60 * 60 * 1000;

// Nulls sort last in both directions
function compareValues(a: SortValue, b: SortValue): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    const left = a instanceof Date ? a.getTime() : a;
    const right = b instanceof Date ? b.getTime() : b;
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
}

export function comparator<T>(...keys: SortKey<T>[]): (a: T, b: T) => number {
    return (a, b) => {
        for (const key of keys) {
            const result = compareValues(key.value(a), key.value(b));
            if (result !== 0) {
                const nullInvolved = key.value(a) === null || key.value(b) === null;
                return key.desc && !nullInvolved ? -result : result;
            }
        }
        return 0;
    };
}

export function sortRows<T>(rows: readonly T[], ...keys: SortKey<T>[]): T[] {
    return [...rows].sort(comparator(...keys));
}

export function asc<T>(value: (row: T) => SortValue): SortKey<T> {
    return { value };
}

export function desc<T>(value: (row: T) => SortValue): SortKey<T> {
    return { value, desc: true };
}

export function groupBy<T>(rows: readonly T[], keyOf: (row: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const row of rows) {
        const key = keyOf(row);
        const group = groups.get(key);
        if (group) {
            group.push(row);
        } else {
            groups.set(key, [row]);
        }
    }
    return groups;
}

export function indexBy<T>(rows: readonly T[], keyOf: (row: T) => string): Map<string, T> {
    const index = new Map<string, T>();
    for (const row of rows) {
        index.set(keyOf(row), row);
    }
    return index;
}

/**
 * Keeps one row per key: the one with the latest timestamp. Equal timestamps
 * fall back to the serialized row so the winner does not depend on read order.
 */
export function latestBy<T>(
    rows: readonly T[],
    keyOf: (row: T) => string,
    timestampOf: (row: T) => Date
): T[] {
    const winners = new Map<string, T>();
    for (const row of rows) {
        const key = keyOf(row);
        const current = winners.get(key);
        if (!current) {
            winners.set(key, row);
            continue;
        }
        const delta = timestampOf(row).getTime() - timestampOf(current).getTime();
        if (delta > 0 || (delta === 0 && JSON.stringify(row) > JSON.stringify(current))) {
            winners.set(key, row);
        }
    }
    return [...winners.values()];
}

/**
 * Row number within each partition after ordering; the ranking functions of
 * the recommendation models all go through here.
 */
export function rankWithin<T, R>(
    rows: readonly T[],
    partitionOf: (row: T) => string,
    order: (a: T, b: T) => number,
    build: (row: T, rank: number) => R,
    limit?: number | null
): R[] {
    const ranked: R[] = [];
    const partitions = [...groupBy(rows, partitionOf).entries()].sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0
    );
    for (const [, partition] of partitions) {
        const ordered = [...partition].sort(order);
        const kept = limit === null || limit === undefined ? ordered : ordered.slice(0, limit);
        kept.forEach((row, index) => ranked.push(build(row, index + 1)));
    }
    return ranked;
}

export function uniqueSorted(values: Iterable<string>): string[] {
    return [...new Set(values)].sort();
}

export function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

export function daysBefore(now: Date, days: number): Date {
    return new Date(now.getTime() - days * DAY_MS);
}

// Whole days elapsed, truncated like an interval's day field
export function elapsedDays(now: Date, at: Date): number {
    return Math.floor((now.getTime() - at.getTime()) / DAY_MS);
}

export function utcDate(at: Date): string {
    return at.toISOString().slice(0, 10);
}
