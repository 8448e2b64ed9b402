import { Base64 } from "js-base64";
import { Response } from "cross-fetch";

import type { FetchFn } from "../../client.js";

export type RecordedRequest = {
    url: string,
    method: string,
    authorization: string | null,
    contentType: string | null,
    body: string,
    signal: AbortSignal | null,
};

export type Responder = (request: RecordedRequest) => Response | Promise<Response>;

/** In-process stand-in for the gateway: records every request and answers with scripted replies. */
export class FakeGateway {
    readonly requests: Array<RecordedRequest> = [];
    #responders: Array<Responder> = [];

    reply(...responders: Array<Responder>): this {
        this.#responders.push(...responders);
        return this;
    }

    readonly fetch: FetchFn = async (request) => {
        const recorded: RecordedRequest = {
            url: request.url,
            method: request.method,
            authorization: request.headers.get("authorization"),
            contentType: request.headers.get("content-type"),
            body: await request.text(),
            signal: request.signal ?? null,
        };
        this.requests.push(recorded);

        const responder = this.#responders.shift();
        if (responder === undefined) {
            throw new Error(`Unexpected request to ${request.url}`);
        }
        return responder(recorded);
    };

    /** SQL texts of all Execute requests, in the order they were sent. */
    get statements(): Array<string> {
        return this.requests.flatMap((request) => {
            const body: unknown = JSON.parse(request.body);
            if (typeof body === "object" && body !== null && "query" in body && typeof body.query === "string") {
                return [body.query];
            }
            return [];
        });
    }

    /** The `session` property of the body of request number `index`. */
    sentSession(index: number): unknown {
        const body: unknown = JSON.parse(this.requests[index].body);
        if (typeof body === "object" && body !== null && "session" in body) {
            return body.session;
        }
        return undefined;
    }
}

export function json(body: unknown, status: number = 200): Responder {
    return () => new Response(JSON.stringify(body), {
        status,
        headers: {"content-type": "application/json"},
    });
}

export function text(body: string, status: number): Responder {
    return () => new Response(body, {
        status,
        headers: {"content-type": "text/plain"},
    });
}

/** A responder that waits until `release()` is called before answering with `responder`. */
export function deferred(responder: Responder): {responder: Responder, release: () => void} {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
        release = resolve;
    });
    return {
        responder: async (request) => {
            await released;
            return responder(request);
        },
        release,
    };
}

/** A responder that never answers and fails only when the request is aborted. */
export function hang(): Responder {
    return (request) => new Promise<Response>((_resolve, reject) => {
        const signal = request.signal;
        if (signal === null) {
            reject(new Error("Request has no abort signal"));
        } else if (signal.aborted) {
            reject(signal.reason);
        } else {
            signal.addEventListener("abort", () => reject(signal.reason), {once: true});
        }
    });
}

export type SessionJson = {
    signature: string,
    vitessSession: {[key: string]: unknown},
};

export function sessionJson(signature: string, vitessSession: {[key: string]: unknown} = {}): SessionJson {
    return {
        signature,
        vitessSession: {
            autocommit: true,
            options: {includedFields: "ALL", clientFoundRows: true},
            DDLStrategy: "direct",
            SessionUUID: `uuid-${signature}`,
            enableSystemSettings: true,
            ...vitessSession,
        },
    };
}

export function encodeRow(values: Array<string | null>): {lengths: Array<string>, values: string} {
    const encoder = new TextEncoder();
    const lengths = values.map((value) => value === null ? "-1" : ""+encoder.encode(value).length);
    return {lengths, values: Base64.encode(values.filter((value) => value !== null).join(""))};
}

export function executeOk(signature: string, result: unknown): Responder {
    return json({session: sessionJson(signature), result});
}

export function executeError(signature: string, message: string, code: string): Responder {
    return json({session: sessionJson(signature), error: {message, code}});
}
