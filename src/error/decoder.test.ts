import axios from "axios";
import { encodeErrorResult, parseAbiItem } from "viem";
import { PANIC_ABI, PANIC_REASONS, SELECTOR_REGISTRY, ERROR_STRING_ABI } from "./types";
import { describe, it, expect, vi, beforeEach, Mock, assert } from "vitest";
import {
    SelectorCache,
    tryDecodeError,
    tryDecodePanic,
    tryGetSignature,
    decodeCallFailure,
} from "./decoder";

vi.mock("axios");

const customErrorSig = "InsufficientBalance(uint256 available, uint256 required)";
const customErrorData = encodeErrorResult({
    abi: [parseAbiItem("error " + customErrorSig)],
    errorName: "InsufficientBalance",
    args: [1n, 2n],
});
const customSelector = customErrorData.slice(0, 10);

describe("Test decoder functions", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        SelectorCache.clear();
    });

    describe("Test tryDecodeError function", () => {
        it("should return error for invalid hex data", async () => {
            const result = await tryDecodeError("invalid-hex");

            assert(result.isErr());
            expect(result.error.message).toBe(
                "invalid data, expected hex string with at least 4 bytes",
            );
        });

        it("should decode panic error successfully", async () => {
            const data = encodeErrorResult({
                abi: [PANIC_ABI],
                errorName: "Panic",
                args: [0x11n],
            });
            const result = await tryDecodeError(data);

            assert(result.isOk());
            expect(result.value).toEqual({
                name: "Panic",
                args: [
                    "arithmetic operation resulted in underflow or overflow outside of an unchecked block",
                ],
            });
            expect(axios.get).not.toHaveBeenCalled();
        });

        it("should decode Error(string) without registry lookup", async () => {
            const data = encodeErrorResult({
                abi: [ERROR_STRING_ABI],
                errorName: "Error",
                args: ["not owner"],
            });
            const result = await tryDecodeError(data);

            assert(result.isOk());
            expect(result.value).toEqual({ name: "Error", args: ["not owner"] });
            expect(axios.get).not.toHaveBeenCalled();
        });

        it("should decode custom error with cached signature", async () => {
            SelectorCache.set(customSelector, [customErrorSig]);

            const result = await tryDecodeError(customErrorData);

            assert(result.isOk());
            expect(result.value).toEqual({ name: "InsufficientBalance", args: [1n, 2n] });
            expect(axios.get).not.toHaveBeenCalled();
        });

        it("should not query the registry for unknown selectors when lookup is off", async () => {
            const result = await tryDecodeError(customErrorData, false);

            assert(result.isErr());
            expect(result.error.message).toBe(`unknown error selector: ${customSelector}`);
            expect(axios.get).not.toHaveBeenCalled();
        });

        it("should still decode cached selectors when lookup is off", async () => {
            SelectorCache.set(customSelector, [customErrorSig]);

            const result = await tryDecodeError(customErrorData, false);

            assert(result.isOk());
            expect(result.value).toEqual({ name: "InsufficientBalance", args: [1n, 2n] });
            expect(axios.get).not.toHaveBeenCalled();
        });

        it("should fetch signature from registry when not cached", async () => {
            (axios.get as Mock).mockResolvedValue({
                data: {
                    result: {
                        function: {
                            [customSelector]: [
                                { name: "SomethingElse(string reason)" },
                                { name: customErrorSig },
                            ],
                        },
                    },
                },
            });

            const result = await tryDecodeError(customErrorData);

            assert(result.isOk());
            expect(result.value).toEqual({ name: "InsufficientBalance", args: [1n, 2n] });
            expect(axios.get).toHaveBeenCalledWith(SELECTOR_REGISTRY, {
                params: {
                    function: customSelector,
                    filter: true,
                },
                headers: {
                    accept: "application/json",
                },
            });
            expect(SelectorCache.get(customSelector)).toEqual([
                "SomethingElse(string reason)",
                customErrorSig,
            ]);
        });

        it("should return error when signature fetch fails", async () => {
            (axios.get as Mock).mockRejectedValue(new Error("Registry unavailable"));

            const result = await tryDecodeError(customErrorData);

            assert(result.isErr());
            expect(result.error.message).toBe("Registry unavailable");
        });

        it("should return error when no signatures match", async () => {
            SelectorCache.set(customSelector, ["InsufficientBalance(string reason)"]);

            const result = await tryDecodeError(customErrorData);

            assert(result.isErr());
            expect(result.error.message).toBe(
                "Failed to decode the error as none of the known signatures matched with the error",
            );
        });
    });

    describe("Test tryGetSignature function", () => {
        it("should reject invalid selectors", async () => {
            const result = await tryGetSignature("0x12");

            assert(result.isErr());
            expect(result.error.message).toBe("Invalid selector 0x12, must be 4 bytes hex string");
        });

        it("should normalize the selector before reading the cache", async () => {
            SelectorCache.set("0xabcdef12", ["Custom()"]);

            const result = await tryGetSignature("ABCDEF12");

            assert(result.isOk());
            expect(result.value).toEqual(["Custom()"]);
        });

        it("should return error for empty registry results", async () => {
            (axios.get as Mock).mockResolvedValue({
                data: { result: { function: { "0x11111111": [] } } },
            });

            const result = await tryGetSignature("0x11111111");

            assert(result.isErr());
            expect(result.error.message).toBe("Response from registry contains empty results");
        });
    });

    describe("Test tryDecodePanic function", () => {
        it("should map known panic codes", () => {
            const data = encodeErrorResult({ abi: [PANIC_ABI], errorName: "Panic", args: [0x12n] });
            const result = tryDecodePanic(data);

            assert(result.isOk());
            expect(result.value).toEqual({ name: "Panic", args: [PANIC_REASONS[0x12]] });
        });

        it("should report unknown panic codes", () => {
            const data = encodeErrorResult({ abi: [PANIC_ABI], errorName: "Panic", args: [0x99n] });
            const result = tryDecodePanic(data);

            assert(result.isOk());
            expect(result.value).toEqual({
                name: "Panic",
                args: ["unknown reason with code: 0x99"],
            });
        });

        it("should return error for malformed panic data", () => {
            const result = tryDecodePanic("0x4e487b71");

            assert(result.isErr());
        });
    });

    describe("Test decodeCallFailure function", () => {
        it("should report failures without revert data", async () => {
            const result = await decodeCallFailure({ index: 2, returnData: "0x" });

            assert(result.isErr());
            expect(result.error.message).toBe("call at index 2 reverted without data");
        });

        it("should decode the revert data of a failed call", async () => {
            const returnData = encodeErrorResult({
                abi: [ERROR_STRING_ABI],
                errorName: "Error",
                args: ["paused"],
            });
            const result = await decodeCallFailure({ index: 0, returnData });

            assert(result.isOk());
            expect(result.value).toEqual({ name: "Error", args: ["paused"] });
        });
    });
});
