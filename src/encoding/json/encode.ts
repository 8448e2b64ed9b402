import type { Value } from "./decode.js";

export type ObjectFun<T> = (w: ObjectWriter, value: T) => void;

export class ObjectWriter {
    #output: Array<string>;
    #isFirst: boolean;

    constructor(output: Array<string>) {
        this.#output = output;
        this.#isFirst = false;
    }

    begin(): void {
        this.#output.push('{');
        this.#isFirst = true;
    }

    end(): void {
        this.#output.push('}');
        this.#isFirst = false;
    }

    #key(name: string): void {
        if (this.#isFirst) {
            this.#output.push('"');
            this.#isFirst = false;
        } else {
            this.#output.push(',"');
        }
        this.#output.push(name);
        this.#output.push('":');
    }

    string(name: string, value: string): void {
        this.#key(name);
        this.#output.push(JSON.stringify(value));
    }

    null(name: string): void {
        this.#key(name);
        this.#output.push("null");
    }

    /** Writes an already decoded JSON value back out unchanged. */
    json(name: string, value: Value): void {
        this.#key(name);
        this.#output.push(JSON.stringify(value));
    }
}

export function writeJsonObject<T>(value: T, fun: ObjectFun<T>): string {
    const output: Array<string> = [];
    const writer = new ObjectWriter(output);
    writer.begin();
    fun(writer, value);
    writer.end();
    return output.join("");
}
