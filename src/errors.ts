import type * as proto from "./proto.js";

/** Generic error produced by the gateway client. */
export class ClientError extends Error {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "ClientError";
    }
}

/** Error thrown when the server violates the protocol, for example by sending an envelope of unexpected
 * shape or an Execute response without both `result` and `error`. */
export class ProtocolError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "ProtocolError";
    }
}

/** Error thrown when the gateway rejects a statement.
 *
 * The session carried by the same response has already been stored on the client when this error is
 * thrown.
 */
export class StatementError extends ClientError {
    code: string | undefined;
    /** @internal */
    proto: proto.VitessError;

    /** @private */
    constructor(protoError: proto.VitessError) {
        super(protoError.message);
        this.name = "StatementError";
        this.code = protoError.code;
        this.proto = protoError;
        this.stack = undefined;
    }
}

/** Error thrown when the HTTP request fails: the server answered with a non-success status (`status` is
 * set), or the request did not complete at all (`status` is `undefined` and `cause` holds the underlying
 * error). */
export class TransportError extends ClientError {
    status: number | undefined;

    /** @private */
    constructor(message: string, status: number | undefined, cause?: unknown) {
        super(message);
        this.name = "TransportError";
        this.status = status;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

/** Error thrown when row data cannot be decoded into values. */
export class DecodeError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "DecodeError";
    }
}

/** Error thrown when the API is misused. */
export class MisuseError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "MisuseError";
    }
}

/** Error thrown when a database URL is not valid. */
export class DatabaseUrlParseError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "DatabaseUrlParseError";
    }
}

/** Error thrown when an internal invariant is violated. */
export class InternalError extends ClientError {
    /** @private */
    constructor(message: string) {
        super(message);
        this.name = "InternalError";
    }
}
