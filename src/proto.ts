// Types for the JSON messages exchanged with the gateway.

import type * as json from "./encoding/json/decode.js";

export type ExecuteReq = {
    query: string,
    session: Session | undefined,
}

export type ExecuteResp = {
    session: Session,
    result: QueryResult | undefined,
    error: VitessError | undefined,
}

export type CreateSessionResp = QuerySession;

export type QuerySession = {
    branch: string,
    user: User,
    session: Session,
}

export type User = {
    username: string,
    psid: string | undefined,
    role: string | undefined,
}

/** Session issued by the gateway. The client sends `json` back verbatim with the next request, so `json` is
 * deeply frozen; the other properties are a read-only view of it. */
export type Session = {
    signature: string,
    vitessSession: VitessSession,
    json: json.Obj,
}

export type VitessSession = {
    autocommit: boolean,
    foundRows: string | undefined,
    rowCount: string | undefined,
    options: SessionOptions | undefined,
    DDLStrategy: string | undefined,
    SessionUUID: string | undefined,
    enableSystemSettings: boolean,
}

export type SessionOptions = {
    includedFields: string | undefined,
    clientFoundRows: boolean,
}

export type QueryResult = {
    rowsAffected: string | undefined,
    insertId: string | undefined,
    fields: Array<Field> | undefined,
    rows: Array<Row> | undefined,
}

export type Field = {
    name: string,
    type: string,
    table: string | undefined,
}

export type Row = {
    lengths: Array<string>,
    values: string | undefined,
}

export type VitessError = {
    message: string,
    code: string | undefined,
}
