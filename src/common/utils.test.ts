import { describe, it, expect } from "vitest";
import { blockToString, toError, withBigintSerializer } from "./utils";

describe("Test withBigIntSerializer function", async function () {
    it("should test withBigIntSerializer", async function () {
        // bigint
        expect(withBigintSerializer("key", 123n)).toBe("123");

        // set
        expect(withBigintSerializer("key", new Set(["a", "b", "c"]))).toStrictEqual([
            "a",
            "b",
            "c",
        ]);

        // set wih bigint
        const value = {
            a: 123n,
            b: new Set([1n, 2n]),
        };
        expect(JSON.stringify(value, withBigintSerializer)).toBe('{"a":"123","b":["1","2"]}');

        // else
        expect(withBigintSerializer("key", 123)).toBe(123);
    });
});

describe("Test blockToString function", async function () {
    it("should stringify every block reference form", async function () {
        expect(blockToString(19000000n)).toBe("19000000");
        expect(blockToString("pending")).toBe("pending");
        const blockHash = `0x${"ab".repeat(32)}` as const;
        expect(blockToString({ blockHash })).toBe(blockHash);
    });
});

describe("Test toError function", async function () {
    it("should normalize thrown values into errors", async function () {
        const error = new Error("boom");
        expect(toError(error)).toBe(error);
        expect(toError("some reason").message).toBe("some reason");
        expect(toError({ code: 1n }).message).toBe('{"code":"1"}');
        expect(toError(undefined).message).toBe("undefined");
    });
});
