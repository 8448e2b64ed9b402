import { fetch, Request, Headers } from "cross-fetch";

import type { QueryCache } from "./cache.js";
import { MemoryCache } from "./cache.js";
import { defaultGatewayPath } from "./database_url.js";
import * as d from "./encoding/json/decode.js";
import { readJsonObject } from "./encoding/json/decode.js";
import type * as e from "./encoding/json/encode.js";
import { writeJsonObject } from "./encoding/json/encode.js";
import { ProtocolError, TransportError } from "./errors.js";
import {
    ExecuteResp as json_ExecuteResp,
    CreateSessionResp as json_CreateSessionResp,
} from "./http/json_decode.js";
import {
    ExecuteReq as json_ExecuteReq,
    CreateSessionReq as json_CreateSessionReq,
} from "./http/json_encode.js";
import type { Logger } from "./logger.js";
import { stderrLogger } from "./logger.js";
import type * as proto from "./proto.js";
import type { InQuery, Query } from "./query.js";
import { cacheKeyFor, queryFromIn } from "./query.js";
import { QueryResult, errorFromProto } from "./result.js";
import { basicAuthorization, impossible } from "./util.js";
import type { Int64Mode } from "./value.js";

export const defaultUrl = `https://aws.connect.psdb.cloud${defaultGatewayPath}`;

/** Function used to send HTTP requests. It is always called with a `Request` object from `cross-fetch`. */
export type FetchFn = (request: Request) => Promise<Response>;

/** Configuration of a {@link GatewayClient}. */
export interface ClientConfig {
    /** Base URL of the gateway. Statements are sent to `{url}/Execute` and sessions are created at
     * `{url}/CreateSession`. */
    url?: string | URL;
    /** Function used in place of the `fetch` function from `cross-fetch`. */
    fetch?: FetchFn;
    /** Timeout of each HTTP request in milliseconds. */
    timeout?: number;
    /** Representation of 64-bit integers in query results. See {@link Int64Mode}. */
    int64Mode?: Int64Mode;
    /** Store for results of queries with a TTL cache policy. Defaults to a {@link MemoryCache} owned by the
     * client. */
    cache?: QueryCache;
    /** Receives diagnostic records. Defaults to {@link stderrLogger}. */
    logger?: Logger;
}

type QueueEntry = ExecuteEntry | CreateSessionEntry;

type ExecuteEntry = {
    type: "execute",
    query: Query,
    responseCallback: (_: proto.ExecuteResp) => void,
    errorCallback: (_: Error) => void,
}

type CreateSessionEntry = {
    type: "create_session",
    responseCallback: (_: proto.CreateSessionResp) => void,
    errorCallback: (_: Error) => void,
}

/** A client for the SQL gateway.
 *
 * The client holds the session issued by the gateway and sends it with every statement, so statements
 * executed through one client run in one database session. Requests of a single client are sent one at a
 * time, in the order in which they were made.
 */
export class GatewayClient {
    #username: string;
    #password: string;
    #config: ClientConfig;
    #url: string;
    #authorization: string;
    #fetch: FetchFn;
    #cache: QueryCache;
    #logger: Logger;
    #int64Mode: Int64Mode;

    #session: proto.Session | undefined;
    #queue: Array<QueueEntry>;
    #flushing: boolean;

    constructor(username: string, password: string, config: ClientConfig = {}) {
        this.#username = username;
        this.#password = password;
        this.#config = config;
        this.#url = (config.url ?? defaultUrl).toString().replace(/\/+$/, "");
        this.#authorization = basicAuthorization(username, password);
        this.#fetch = config.fetch ?? fetch;
        this.#cache = config.cache ?? new MemoryCache();
        this.#logger = config.logger ?? stderrLogger;
        this.#int64Mode = config.int64Mode ?? "string";

        this.#session = undefined;
        this.#queue = [];
        this.#flushing = false;
    }

    /** The user name that this client authenticates with. */
    get username(): string {
        return this.#username;
    }

    /** The session received with the latest response, or `undefined` if the client has not received any
     * response yet. */
    get session(): proto.Session | undefined {
        return this.#session;
    }

    /** Execute a statement.
     *
     * @throws {StatementError} if the gateway rejects the statement.
     * @throws {TransportError} if the HTTP request fails.
     */
    async execute(query: InQuery): Promise<QueryResult> {
        const q = queryFromIn(query);

        const cacheKey = cacheKeyFor(this.#username, q);
        if (cacheKey !== undefined) {
            const cached = this.#cache.get(cacheKey);
            if (cached !== undefined) {
                this.#logger.debug("Returning cached result", {cacheKey});
                return cached;
            }
        }

        const response = await new Promise<proto.ExecuteResp>((responseCallback, errorCallback) => {
            this.#pushToQueue({type: "execute", query: q, responseCallback, errorCallback});
        });

        if (response.error !== undefined) {
            this.#logger.debug("Statement failed", {code: response.error.code, message: response.error.message});
            throw errorFromProto(response.error);
        } else if (response.result === undefined) {
            throw new ProtocolError("Execute response contains neither a result nor an error");
        }

        const result = new QueryResult(response.result, this.#int64Mode);
        if (cacheKey !== undefined && q.cachePolicy.type === "ttl") {
            this.#cache.set(cacheKey, result, q.cachePolicy.seconds);
        }
        return result;
    }

    /** Execute `fn` in a transaction.
     *
     * The transaction runs on a new client with the same credentials and configuration, which is passed to
     * `fn`; the session of this client is not affected. The transaction is committed when `fn` resolves. If
     * `fn` or the COMMIT fails, the transaction is rolled back and the original error is rethrown.
     *
     * @example
     * ```ts
     * await client.transaction(async (tx) => {
     *     await tx.execute("UPDATE accounts SET balance = balance - 100 WHERE id = 1");
     *     await tx.execute("UPDATE accounts SET balance = balance + 100 WHERE id = 2");
     * });
     * ```
     */
    async transaction<T>(fn: (tx: GatewayClient) => Promise<T>): Promise<T> {
        const tx = new GatewayClient(this.#username, this.#password, this.#config);
        try {
            await tx.execute("BEGIN");
            const result = await fn(tx);
            await tx.execute("COMMIT");
            return result;
        } catch (error) {
            try {
                await tx.execute("ROLLBACK");
            } catch (rollbackError) {
                this.#logger.warn("Failed to roll back transaction", {error: `${rollbackError}`});
            }
            throw error;
        }
    }

    /** Turn caching of query results on the gateway on or off for this session. */
    async boost(enabled: boolean = true): Promise<void> {
        await this.execute(`SET @@boost_cached_queries = ${enabled};`);
    }

    /** Create a new session on the gateway, replacing the session held by this client. */
    refresh(): Promise<proto.QuerySession> {
        return new Promise((responseCallback, errorCallback) => {
            this.#pushToQueue({type: "create_session", responseCallback, errorCallback});
        });
    }

    #pushToQueue(entry: QueueEntry): void {
        this.#queue.push(entry);
        queueMicrotask(() => this.#flushQueue());
    }

    #flushQueue(): void {
        if (this.#flushing) {
            return;
        }

        const entry = this.#queue.shift();
        if (entry === undefined) {
            return;
        } else if (entry.type === "execute") {
            this.#flush<proto.ExecuteReq, proto.ExecuteResp>(
                "Execute",
                // the session is read when the request is sent, after all earlier responses were stored
                () => ({query: entry.query.sql, session: this.#session}),
                json_ExecuteReq,
                json_ExecuteResp,
                entry.responseCallback,
                entry.errorCallback,
            );
        } else if (entry.type === "create_session") {
            this.#flush<Record<string, never>, proto.CreateSessionResp>(
                "CreateSession",
                () => ({}),
                json_CreateSessionReq,
                json_CreateSessionResp,
                entry.responseCallback,
                entry.errorCallback,
            );
        } else {
            throw impossible(entry, "Impossible type of QueueEntry");
        }
    }

    #flush<Q, R extends {session: proto.Session}>(
        method: string,
        createReqBody: () => Q,
        encodeReqBody: e.ObjectFun<Q>,
        decodeRespBody: d.ObjectFun<R>,
        handleResponse: (_: R) => void,
        handleError: (_: Error) => void,
    ): void {
        let promise: Promise<Response>;
        try {
            const request = this.#createRequest(method, writeJsonObject(createReqBody(), encodeReqBody));
            this.#logger.debug("Sending request", {method, url: request.url});
            promise = this.#fetch(request).catch((error) => {
                throw new TransportError(`Request to ${request.url} failed: ${error}`, undefined, error);
            });
        } catch (error) {
            promise = Promise.reject(error);
        }

        this.#flushing = true;
        promise.then(async (resp: Response): Promise<R> => {
            this.#logger.debug("Received response", {method, status: resp.status});
            if (!resp.ok) {
                throw await errorFromResponse(resp);
            }
            return readJsonObject(await readBody(resp), decodeRespBody);
        }).then((respBody: R) => {
            this.#session = respBody.session;
            handleResponse(respBody);
        }).catch((error: Error) => {
            handleError(error);
        }).finally(() => {
            this.#flushing = false;
            this.#flushQueue();
        });
    }

    #createRequest(method: string, body: string): Request {
        const headers = new Headers();
        headers.set("content-type", "application/json");
        headers.set("authorization", this.#authorization);

        const signal = this.#config.timeout !== undefined ? AbortSignal.timeout(this.#config.timeout) : undefined;
        return new Request(`${this.#url}/${method}`, {method: "POST", headers, body, signal});
    }
}

async function readBody(resp: Response): Promise<string> {
    try {
        return await resp.text();
    } catch (error) {
        throw new TransportError(`Failed to read the response body: ${error}`, resp.status, error);
    }
}

async function errorFromResponse(resp: Response): Promise<Error> {
    const respType = resp.headers.get("content-type") ?? "text/plain";
    let message = `Server returned HTTP status ${resp.status}`;

    const respBody = (await readBody(resp)).trim();
    const detail = respType.startsWith("application/json") ? messageFromJson(respBody) : respBody;
    if (detail !== undefined && detail !== "") {
        message += `: ${detail}`;
    }
    return new TransportError(message, resp.status);
}

function messageFromJson(text: string): string | undefined {
    try {
        return readJsonObject(text, (obj) => d.stringOpt(obj["message"]));
    } catch (error) {
        if (error instanceof ProtocolError) {
            return text;
        }
        throw error;
    }
}
