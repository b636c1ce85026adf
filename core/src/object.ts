import type { Keyable } from "./types";

export interface UniqueKey {
    uniqueKey(): Keyable;
}

// Map keyed by value objects; two keys are the same entry when their unique keys match.
export class ObjectMap<T extends UniqueKey, V> {
    #entries: Map<Keyable, [T, V]> = new Map();

    get size(): number {
        return this.#entries.size;
    }

    entries(): IterableIterator<[T, V]> {
        return this.#entries.values();
    }

    get(key: T): V | undefined {
        return this.#entries.get(key.uniqueKey())?.[1];
    }

    has(key: T): boolean {
        return this.#entries.has(key.uniqueKey());
    }

    *keys(): IterableIterator<T> {
        for (const [k] of this.#entries.values()) {
            yield k;
        }
    }

    set(key: T, value: V): this {
        this.#entries.set(key.uniqueKey(), [key, value]);
        return this;
    }

    *values(): IterableIterator<V> {
        for (const [, v] of this.#entries.values()) {
            yield v;
        }
    }
}

export class ObjectSet<T extends UniqueKey> {
    #keyMap: Map<Keyable, T> = new Map();

    constructor(values?: Iterable<T>) {
        for (const value of values ?? []) {
            this.add(value);
        }
    }

    get size(): number {
        return this.#keyMap.size;
    }

    add(value: T): this {
        this.#keyMap.set(value.uniqueKey(), value);
        return this;
    }

    has(value: T): boolean {
        return this.#keyMap.has(value.uniqueKey());
    }

    values(): IterableIterator<T> {
        return this.#keyMap.values();
    }
}
