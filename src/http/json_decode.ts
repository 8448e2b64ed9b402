import * as d from "../encoding/json/decode.js";
import type * as proto from "../proto.js";

export function ExecuteResp(obj: d.Obj): proto.ExecuteResp {
    const session = Session(d.object(obj["session"]));
    const result = d.objectOpt(obj["result"], QueryResult);
    const error = d.objectOpt(obj["error"], VitessError);
    return {session, result, error};
}

export function CreateSessionResp(obj: d.Obj): proto.CreateSessionResp {
    const branch = d.string(obj["branch"]);
    const user = User(d.object(obj["user"]));
    const session = Session(d.object(obj["session"]));
    return {branch, user, session};
}

function User(obj: d.Obj): proto.User {
    const username = d.string(obj["username"]);
    const psid = d.stringOpt(obj["psid"]);
    const role = d.stringOpt(obj["role"]);
    return {username, psid, role};
}

function Session(obj: d.Obj): proto.Session {
    const signature = d.string(obj["signature"]);
    const vitessSession = VitessSession(d.object(obj["vitessSession"]));
    return {signature, vitessSession, json: d.frozen(obj)};
}

// Absent booleans are false: the gateway omits default values from its JSON output.
function VitessSession(obj: d.Obj): proto.VitessSession {
    const autocommit = d.booleanOpt(obj["autocommit"]) ?? false;
    const foundRows = d.integerStringOpt(obj["foundRows"]);
    const rowCount = d.integerStringOpt(obj["rowCount"]);
    const options = d.objectOpt(obj["options"], SessionOptions);
    const DDLStrategy = d.stringOpt(obj["DDLStrategy"]);
    const SessionUUID = d.stringOpt(obj["SessionUUID"]);
    const enableSystemSettings = d.booleanOpt(obj["enableSystemSettings"]) ?? false;
    return {autocommit, foundRows, rowCount, options, DDLStrategy, SessionUUID, enableSystemSettings};
}

function SessionOptions(obj: d.Obj): proto.SessionOptions {
    const includedFields = d.stringOpt(obj["includedFields"]);
    const clientFoundRows = d.booleanOpt(obj["clientFoundRows"]) ?? false;
    return {includedFields, clientFoundRows};
}

export function QueryResult(obj: d.Obj): proto.QueryResult {
    const rowsAffected = d.integerStringOpt(obj["rowsAffected"]);
    const insertId = d.integerStringOpt(obj["insertId"]);
    const fields = d.arrayObjectsMapOpt(obj["fields"], Field);
    const rows = d.arrayObjectsMapOpt(obj["rows"], Row);
    return {rowsAffected, insertId, fields, rows};
}

function Field(obj: d.Obj): proto.Field {
    const name = d.string(obj["name"]);
    const type = d.stringOpt(obj["type"]) ?? "NULL_TYPE";
    const table = d.stringOpt(obj["table"]);
    return {name, type, table};
}

function Row(obj: d.Obj): proto.Row {
    const lengths = d.array(obj["lengths"] ?? []).map(d.integerString);
    const values = d.stringOpt(obj["values"]);
    return {lengths, values};
}

function VitessError(obj: d.Obj): proto.VitessError {
    const message = d.string(obj["message"]);
    const code = d.stringOpt(obj["code"]);
    return {message, code};
}
