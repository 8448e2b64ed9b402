import { Base64 } from "js-base64";

import { DecodeError } from "./errors.js";
import type { EncodedRow } from "./result.js";

const lengthRegexp = /^-?\d+$/;

// Columns of these types hold raw bytes, which are returned with one character per byte.
const binaryTypes = new Set(["BINARY", "VARBINARY", "BLOB", "BIT", "GEOMETRY"]);

/** Splits the value blob of a row into the raw text of each column.
 *
 * The blob is the base64 encoding of all non-NULL column values concatenated. `lengths` gives the byte
 * length of each column in order; a negative length marks a NULL column, which occupies no bytes.
 *
 * Columns are decoded as UTF-8, except columns whose type in `types` is a binary type (`BINARY`,
 * `VARBINARY`, `BLOB`, `BIT`, `GEOMETRY`): their bytes are returned as a binary string, in which each
 * character code is one byte.
 */
export function decodeRow(
    row: EncodedRow,
    fieldCount: number,
    types?: ReadonlyArray<string>,
): Array<string | null> {
    if (row.lengths.length !== fieldCount) {
        throw new DecodeError(
            `Row has ${row.lengths.length} column lengths, but the result has ${fieldCount} fields`,
        );
    }

    const data = row.values !== undefined ? blobToBytes(row.values) : new Uint8Array(0);
    const decoder = new TextDecoder();

    let offset = 0;
    const values = row.lengths.map((lengthStr, column) => {
        if (!lengthRegexp.test(lengthStr)) {
            throw new DecodeError(`Length of column ${column} is not an integer: ${JSON.stringify(lengthStr)}`);
        }
        const length = parseInt(lengthStr, 10);
        if (length < 0) {
            return null;
        }
        if (offset + length > data.length) {
            throw new DecodeError(
                `Column ${column} needs ${length} bytes at offset ${offset}, ` +
                    `but the row data has only ${data.length} bytes`,
            );
        }
        const bytes = data.subarray(offset, offset + length);
        const value = types !== undefined && binaryTypes.has(types[column])
            ? binaryString(bytes)
            : decoder.decode(bytes);
        offset += length;
        return value;
    });

    if (offset !== data.length) {
        throw new DecodeError(
            `Row data has ${data.length} bytes, but the column lengths add up to ${offset}`,
        );
    }
    return values;
}

function blobToBytes(values: string): Uint8Array {
    if (!Base64.isValid(values)) {
        throw new DecodeError("Row data is not valid base64");
    }
    return Base64.toUint8Array(values);
}

function binaryString(bytes: Uint8Array): string {
    let str = "";
    for (const byte of bytes) {
        str += String.fromCharCode(byte);
    }
    return str;
}
