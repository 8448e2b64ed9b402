import { DecodeError, MisuseError } from "./errors.js";

/** JavaScript values that you can receive from the database in a query result. */
export type Value =
    | null
    | string
    | number
    | bigint

/** Possible representations of 64-bit integers (`INT64` and `UINT64` columns) in JavaScript:
 *
 * - `"string"` (default): returns the decimal text sent by the server, unchanged.
 * - `"bigint"`: returns JavaScript `bigint`-s, which represent every 64-bit integer precisely.
 * - `"number"`: returns JavaScript `number`-s. `number` cannot precisely represent integers larger than
 * 2^53-1 in absolute value, so reading such a value throws a {@link DecodeError}.
 */
export type Int64Mode = "string" | "bigint" | "number";

const integerTypes = new Set([
    "INT8", "INT16", "INT24", "INT32",
    "UINT8", "UINT16", "UINT24", "UINT32",
    "YEAR",
]);

const floatTypes = new Set(["DECIMAL", "FLOAT32", "FLOAT64"]);

const int64Types = new Set(["INT64", "UINT64"]);

const integerRegexp = /^[+-]?\d+$/;
const floatRegexp = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Converts the raw text of a column value to a JavaScript value according to the column type tag.
 *
 * Types that are not listed here (dates and times, binary strings, `JSON`, and any tag this client does
 * not know) are returned as the original string.
 */
export function castValue(value: string | null, type: string, int64Mode: Int64Mode = "string"): Value {
    if (value === null) {
        return null;
    } else if (integerTypes.has(type)) {
        if (!integerRegexp.test(value)) {
            throw new DecodeError(`Received invalid ${type} value ${JSON.stringify(value)}`);
        }
        return parseInt(value, 10);
    } else if (floatTypes.has(type)) {
        if (!floatRegexp.test(value)) {
            throw new DecodeError(`Received invalid ${type} value ${JSON.stringify(value)}`);
        }
        return parseFloat(value);
    } else if (int64Types.has(type)) {
        return int64FromString(value, type, int64Mode);
    } else {
        return value;
    }
}

function int64FromString(value: string, type: string, int64Mode: Int64Mode): Value {
    if (int64Mode === "string") {
        return value;
    } else if (!integerRegexp.test(value)) {
        throw new DecodeError(`Received invalid ${type} value ${JSON.stringify(value)}`);
    } else if (int64Mode === "bigint") {
        return BigInt(value);
    } else if (int64Mode === "number") {
        const num = Number(value);
        if (!Number.isSafeInteger(num)) {
            throw new DecodeError(
                `Received ${type} value ${value} which is too large to be safely represented as a JavaScript number`
            );
        }
        return num;
    } else {
        throw new MisuseError("Invalid value for Int64Mode");
    }
}
