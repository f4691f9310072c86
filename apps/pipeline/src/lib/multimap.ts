import { md5 } from './content-key';

/**
 * Key → set of values. Identity links are one-to-many in both directions, so
 * nothing in the identity layer collapses them to a single value implicitly.
 */
export class MultiMap<V extends string = string> {
    private readonly entries = new Map<string, Set<V>>();

    add(key: string, value: V): this {
        const values = this.entries.get(key);
        if (values) {
            values.add(value);
        } else {
            this.entries.set(key, new Set([value]));
        }
        return this;
    }

    addAll(key: string, values: Iterable<V>): this {
        for (const value of values) this.add(key, value);
        return this;
    }

    get(key: string): V[] {
        const values = this.entries.get(key);
        return values ? [...values].sort() : [];
    }

    has(key: string, value?: V): boolean {
        const values = this.entries.get(key);
        if (!values) return false;
        return value === undefined ? true : values.has(value);
    }

    keys(): string[] {
        return [...this.entries.keys()].sort();
    }

    get size(): number {
        let total = 0;
        for (const values of this.entries.values()) total += values.size;
        return total;
    }

    *pairs(): IterableIterator<[string, V]> {
        for (const key of this.keys()) {
            for (const value of this.get(key)) {
                yield [key, value];
            }
        }
    }

    static from<T, V extends string>(
        rows: readonly T[],
        keyOf: (row: T) => string | null,
        valuesOf: (row: T) => Iterable<V>
    ): MultiMap<V> {
        const map = new MultiMap<V>();
        for (const row of rows) {
            const key = keyOf(row);
            if (key !== null) map.addAll(key, valuesOf(row));
        }
        return map;
    }
}

/**
 * Picks one candidate when a single value is structurally required, ordering
 * by the md5 of a secondary key. The choice is stable across runs but does not
 * favour lexically small keys.
 */
export function pickByStableHash<T>(
    candidates: readonly T[],
    keyOf: (candidate: T) => string
): T | null {
    let best: T | null = null;
    let bestHash = '';
    let bestKey = '';
    for (const candidate of candidates) {
        const key = keyOf(candidate);
        const hash = md5(key);
        if (best === null || hash < bestHash || (hash === bestHash && key < bestKey)) {
            best = candidate;
            bestHash = hash;
            bestKey = key;
        }
    }
    return best;
}
