import { ProtocolError } from "../../errors.js";

export type Value = Obj | Array<Value> | string | number | true | false | null;
export type Obj = {[key: string]: Value | undefined};

export type ObjectFun<T> = (obj: Obj) => T;

export function string(value: Value | undefined): string {
    if (typeof value === "string") {
        return value;
    }
    throw typeError(value, "string");
}

export function stringOpt(value: Value | undefined): string | undefined {
    if (value === null || value === undefined) {
        return undefined;
    } else if (typeof value === "string") {
        return value;
    }
    throw typeError(value, "string or null");
}

// 64-bit integers may be encoded either as JSON strings or as JSON numbers.
export function integerString(value: Value | undefined): string {
    if (typeof value === "string") {
        return value;
    } else if (typeof value === "number" && Number.isInteger(value)) {
        return ""+value;
    }
    throw typeError(value, "integer or string");
}

export function integerStringOpt(value: Value | undefined): string | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    return integerString(value);
}

export function booleanOpt(value: Value | undefined): boolean | undefined {
    if (value === null || value === undefined) {
        return undefined;
    } else if (typeof value === "boolean") {
        return value;
    }
    throw typeError(value, "boolean or null");
}

export function array(value: Value | undefined): Array<Value> {
    if (Array.isArray(value)) {
        return value;
    }
    throw typeError(value, "array");
}

export function object(value: Value | undefined): Obj {
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
        return value;
    }
    throw typeError(value, "object");
}

export function objectOpt<T>(value: Value | undefined, fun: ObjectFun<T>): T | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    return fun(object(value));
}

export function arrayObjectsMap<T>(value: Value | undefined, fun: ObjectFun<T>): Array<T> {
    return array(value).map((elemValue) => fun(object(elemValue)));
}

export function arrayObjectsMapOpt<T>(value: Value | undefined, fun: ObjectFun<T>): Array<T> | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    return arrayObjectsMap(value, fun);
}

/** Freezes `obj` and every object and array nested in it. */
export function frozen(obj: Obj): Obj {
    freezeValue(obj);
    return obj;
}

function freezeValue(value: Value | undefined): void {
    if (Array.isArray(value)) {
        value.forEach(freezeValue);
        Object.freeze(value);
    } else if (value !== null && typeof value === "object") {
        for (const key in value) {
            freezeValue(value[key]);
        }
        Object.freeze(value);
    }
}

function typeError(value: Value | undefined, expected: string): Error {
    if (value === undefined) {
        return new ProtocolError(`Expected ${expected}, but the property was missing`);
    }

    let received: string = typeof value;
    if (value === null) {
        received = "null";
    } else if (Array.isArray(value)) {
        received = "array";
    }
    return new ProtocolError(`Expected ${expected}, received ${received}`);
}

export function readJsonObject<T>(text: string, fun: ObjectFun<T>): T {
    let value: Value;
    try {
        value = JSON.parse(text);
    } catch (e) {
        throw new ProtocolError(`Server returned a body that is not valid JSON: ${e}`);
    }
    return fun(object(value));
}
