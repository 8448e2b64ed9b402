import { Base64 } from "js-base64";

import { MisuseError } from "./errors.js";

/** How results of a query may be cached on the client.
 *
 * - `{type: "origin"}` (default): always execute the query on the server.
 * - `{type: "ttl", seconds}`: reuse the result of an identical query by the same user for `seconds` seconds.
 */
export type CachePolicy =
    | { type: "origin" }
    | { type: "ttl", seconds: number }

export const originPolicy: CachePolicy = { type: "origin" };

/** A query that you can send to the gateway. As a shorthand, you can pass just the SQL text, which uses the
 * `"origin"` cache policy. */
export type InQuery = Query | string;

/** SQL text together with a {@link CachePolicy}. */
export class Query {
    /** The SQL statement text. */
    readonly sql: string;
    /** Cache policy for this query. */
    readonly cachePolicy: CachePolicy;

    constructor(sql: string, cachePolicy: CachePolicy = originPolicy) {
        if (cachePolicy.type === "ttl" && !(Number.isFinite(cachePolicy.seconds) && cachePolicy.seconds > 0)) {
            throw new MisuseError("The TTL of a cache policy must be a positive number of seconds");
        }
        this.sql = sql;
        this.cachePolicy = cachePolicy;
    }

    /** Creates a query whose result may be reused for `seconds` seconds. */
    static cached(sql: string, seconds: number): Query {
        return new Query(sql, { type: "ttl", seconds });
    }
}

export function queryFromIn(query: InQuery): Query {
    return query instanceof Query ? query : new Query(query);
}

/** Returns the key under which the result of `query` is cached for `username`, or `undefined` if the
 * query's cache policy does not allow caching. Queries that differ only in leading or trailing whitespace
 * share a key. */
export function cacheKeyFor(username: string, query: Query): string | undefined {
    switch (query.cachePolicy.type) {
        case "ttl":
            return `${username}.${Base64.encode(query.sql.trim())}`;
        case "origin":
            return undefined;
    }
}
