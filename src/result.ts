import type { ZodType, ZodTypeDef } from "zod";

import { DecodeError, StatementError } from "./errors.js";
import type * as proto from "./proto.js";
import { decodeRow } from "./row.js";
import type { Int64Mode, Value } from "./value.js";
import { castValue } from "./value.js";

/** Description of a column in a {@link QueryResult}. */
export interface Field {
    /** Name of the column. */
    name: string;
    /** Type tag of the column, such as `"INT32"`, `"VARCHAR"` or `"DATETIME"`. */
    type: string;
    /** Name of the table that the column comes from, if any. */
    table: string | undefined;
}

/** A row in its wire encoding: the byte length of each column (negative for NULL) and the base64 encoding
 * of all column values concatenated. */
export interface EncodedRow {
    lengths: ReadonlyArray<string>;
    values: string | undefined;
}

/** A row decoded into an object that maps column names to values. */
export type RowRecord = {[name: string]: Value};

/** Result of executing a statement.
 *
 * Rows are kept in their wire encoding and decoded only when you call {@link toRecords} or
 * {@link decodeAs}.
 */
export class QueryResult {
    /** Number of rows that were changed by the statement, as a decimal string. */
    readonly rowsAffected: string | undefined;
    /** ID generated by the last INSERT into a table with an auto-increment column, as a decimal string. */
    readonly insertId: string | undefined;
    /** Columns of the result. This is `undefined` for statements that do not return rows. */
    readonly fields: ReadonlyArray<Field> | undefined;
    /** Rows of the result in their wire encoding. */
    readonly rows: ReadonlyArray<EncodedRow> | undefined;
    #int64Mode: Int64Mode;

    /** @private */
    constructor(result: proto.QueryResult, int64Mode: Int64Mode = "string") {
        this.rowsAffected = result.rowsAffected;
        this.insertId = result.insertId;
        this.fields = result.fields;
        this.rows = result.rows;
        this.#int64Mode = int64Mode;
    }

    /** Names of the columns in the result. */
    get columnNames(): Array<string> {
        return (this.fields ?? []).map((field) => field.name);
    }

    /** Number of rows in the result. */
    get rowCount(): number {
        return this.rows?.length ?? 0;
    }

    /** Decodes every row into an object that maps column names to values.
     *
     * Values are matched with columns by position and converted according to the column type (see
     * {@link castValue}). If two columns share a name, the value of the later column wins.
     */
    toRecords(): Array<RowRecord> {
        const rows = this.rows;
        if (rows === undefined) {
            return [];
        }
        const fields = this.fields;
        if (fields === undefined) {
            return rows.map(() => ({}));
        }
        return rows.map((row) => recordFromRow(fields, row, this.#int64Mode));
    }

    /** Decodes every row and validates it with the given zod `schema`.
     *
     * @throws {DecodeError} if a row does not satisfy the schema.
     */
    decodeAs<T>(schema: ZodType<T, ZodTypeDef, unknown>): Array<T> {
        return this.toRecords().map((record, index) => {
            const parsed = schema.safeParse(record);
            if (!parsed.success) {
                const issues = parsed.error.issues
                    .map((issue) => `${issue.path.join(".") || "(row)"}: ${issue.message}`)
                    .join("; ");
                throw new DecodeError(`Row ${index} does not match the expected shape: ${issues}`);
            }
            return parsed.data;
        });
    }
}

function recordFromRow(fields: ReadonlyArray<Field>, row: EncodedRow, int64Mode: Int64Mode): RowRecord {
    const values = decodeRow(row, fields.length, fields.map((field) => field.type));
    const record: RowRecord = {};
    for (let i = 0; i < fields.length; ++i) {
        const field = fields[i];
        // a column named "__proto__" must become an own property
        Object.defineProperty(record, field.name, {
            value: castValue(values[i], field.type, int64Mode),
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }
    return record;
}

export function errorFromProto(error: proto.VitessError): StatementError {
    return new StatementError(error);
}
