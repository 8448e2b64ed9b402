import type { QueryResult } from "./result.js";

/** Storage for query results cached under a {@link CachePolicy} with a TTL. */
export interface QueryCache {
    /** Returns the result stored under `key`, or `undefined` if there is none or it has expired. */
    get(key: string): QueryResult | undefined;
    /** Stores `result` under `key` for `ttlSeconds` seconds. */
    set(key: string, result: QueryResult, ttlSeconds: number): void;
}

export interface MemoryCacheOptions {
    /** Maximum number of entries, 1000 by default. When the cache is full, the entry stored first is
     * evicted. */
    maxEntries?: number;
    /** Clock returning the current time in milliseconds. */
    now?: () => number;
}

const defaultMaxEntries = 1000;

type Entry = {
    result: QueryResult,
    expiresAt: number,
}

/** A {@link QueryCache} that keeps results in process memory. */
export class MemoryCache implements QueryCache {
    #entries: Map<string, Entry>;
    #maxEntries: number;
    #now: () => number;

    constructor(options: MemoryCacheOptions = {}) {
        this.#entries = new Map();
        this.#maxEntries = options.maxEntries ?? defaultMaxEntries;
        this.#now = options.now ?? Date.now;
    }

    get size(): number {
        return this.#entries.size;
    }

    get(key: string): QueryResult | undefined {
        const entry = this.#entries.get(key);
        if (entry === undefined) {
            return undefined;
        } else if (entry.expiresAt <= this.#now()) {
            this.#entries.delete(key);
            return undefined;
        }
        return entry.result;
    }

    set(key: string, result: QueryResult, ttlSeconds: number): void {
        this.#entries.delete(key);
        this.#deleteExpired();
        while (this.#entries.size >= this.#maxEntries) {
            const oldest = this.#entries.keys().next();
            if (oldest.done) {
                break;
            }
            this.#entries.delete(oldest.value);
        }
        this.#entries.set(key, {result, expiresAt: this.#now() + ttlSeconds * 1000});
    }

    clear(): void {
        this.#entries.clear();
    }

    #deleteExpired(): void {
        const now = this.#now();
        for (const [key, entry] of this.#entries) {
            if (entry.expiresAt <= now) {
                this.#entries.delete(key);
            }
        }
    }
}
