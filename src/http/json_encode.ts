import type * as e from "../encoding/json/encode.js";
import type * as proto from "../proto.js";

export function ExecuteReq(w: e.ObjectWriter, msg: proto.ExecuteReq): void {
    w.string("query", msg.query);
    if (msg.session !== undefined) {
        w.json("session", msg.session.json);
    } else {
        w.null("session");
    }
}

export function CreateSessionReq(_w: e.ObjectWriter, _msg: Record<string, never>): void {
}
