import { Base64 } from "js-base64";

import { InternalError } from "./errors.js";

export function impossible(value: never, message: string): Error {
    throw new InternalError(message);
}

/** Value of the `authorization` header for HTTP Basic authentication. */
export function basicAuthorization(username: string, password: string): string {
    return `Basic ${Base64.encode(`${username}:${password}`)}`;
}
