import * as sqlgate from "..";

describe("castValue()", () => {
    test("integer types", () => {
        expect(sqlgate.castValue("42", "INT32")).toStrictEqual(42);
        expect(sqlgate.castValue("-7", "INT8")).toStrictEqual(-7);
        expect(sqlgate.castValue("65535", "UINT16")).toStrictEqual(65535);
        expect(sqlgate.castValue("8388607", "INT24")).toStrictEqual(8388607);
        expect(sqlgate.castValue("4294967295", "UINT32")).toStrictEqual(4294967295);
        expect(sqlgate.castValue("2024", "YEAR")).toStrictEqual(2024);
    });

    test("floating point types", () => {
        expect(sqlgate.castValue("3.14", "FLOAT64")).toStrictEqual(3.14);
        expect(sqlgate.castValue("-0.5", "FLOAT32")).toStrictEqual(-0.5);
        expect(sqlgate.castValue("12.50", "DECIMAL")).toStrictEqual(12.5);
        expect(sqlgate.castValue("1e3", "FLOAT64")).toStrictEqual(1000);
        expect(sqlgate.castValue("10", "DECIMAL")).toStrictEqual(10);
    });

    test("64-bit integers are kept as strings", () => {
        expect(sqlgate.castValue("9223372036854775807", "INT64")).toStrictEqual("9223372036854775807");
        expect(sqlgate.castValue("18446744073709551615", "UINT64")).toStrictEqual("18446744073709551615");
    });

    test("64-bit integers as bigint", () => {
        expect(sqlgate.castValue("9223372036854775807", "INT64", "bigint"))
            .toStrictEqual(9223372036854775807n);
        expect(sqlgate.castValue("-5", "INT64", "bigint")).toStrictEqual(-5n);
    });

    test("64-bit integers as number", () => {
        expect(sqlgate.castValue("123", "UINT64", "number")).toStrictEqual(123);
        expect(() => sqlgate.castValue("9223372036854775807", "INT64", "number"))
            .toThrow(sqlgate.DecodeError);
    });

    test("string types pass through", () => {
        for (const type of [
            "DATE", "TIME", "DATETIME", "TIMESTAMP", "BLOB", "BIT", "VARBINARY", "BINARY", "JSON",
            "VARCHAR", "SOMETHING_NEW",
        ]) {
            expect(sqlgate.castValue(" 007 ", type)).toStrictEqual(" 007 ");
        }
        expect(sqlgate.castValue("{\"a\":1}", "JSON")).toStrictEqual("{\"a\":1}");
        expect(sqlgate.castValue("2024-02-29 12:00:00", "DATETIME")).toStrictEqual("2024-02-29 12:00:00");
    });

    test("null", () => {
        for (const type of ["INT32", "FLOAT64", "INT64", "VARCHAR", "JSON", "UNKNOWN"]) {
            expect(sqlgate.castValue(null, type)).toStrictEqual(null);
        }
        expect(sqlgate.castValue(null, "INT64", "bigint")).toStrictEqual(null);
    });

    test("malformed numbers", () => {
        expect(() => sqlgate.castValue("forty-two", "INT32")).toThrow(sqlgate.DecodeError);
        expect(() => sqlgate.castValue("4.2", "INT32")).toThrow(/invalid INT32 value "4.2"/);
        expect(() => sqlgate.castValue("", "UINT8")).toThrow(sqlgate.DecodeError);
        expect(() => sqlgate.castValue("abc", "FLOAT64")).toThrow(/invalid FLOAT64 value "abc"/);
        expect(() => sqlgate.castValue("", "DECIMAL")).toThrow(sqlgate.DecodeError);
        expect(() => sqlgate.castValue("0x10", "DECIMAL")).toThrow(sqlgate.DecodeError);
        expect(() => sqlgate.castValue("1.5", "INT64", "bigint")).toThrow(sqlgate.DecodeError);
    });
});
