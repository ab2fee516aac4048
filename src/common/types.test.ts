import { isDynValue } from "./types";
import { describe, it, expect } from "vitest";

describe("Test isDynValue", () => {
    it("should accept abi primitives", () => {
        expect(isDynValue(1n)).toBe(true);
        expect(isDynValue(8)).toBe(true);
        expect(isDynValue(false)).toBe(true);
        expect(isDynValue("0x1234")).toBe(true);
    });

    it("should accept nested arrays and named tuples", () => {
        expect(isDynValue([1n, [true, "0xab"]])).toBe(true);
        expect(isDynValue({ owner: "0x00", amounts: [1n, 2n] })).toBe(true);
    });

    it("should reject non abi values", () => {
        expect(isDynValue(null)).toBe(false);
        expect(isDynValue(undefined)).toBe(false);
        expect(isDynValue([1n, undefined])).toBe(false);
        expect(isDynValue({ fn: () => 1 })).toBe(false);
        expect(isDynValue(Symbol("x"))).toBe(false);
    });
});
