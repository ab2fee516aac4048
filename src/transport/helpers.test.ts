import { describe, it, expect } from "vitest";
import {
    formatCallRequest,
    serializeStateOverride,
    serializeBlockReference,
    serializeAccountOverride,
} from "./helpers";

const target = "0xcA11bde05977b3631167028862bE2a173976CA11";
const slot = `0x${"0".repeat(63)}1` as const;
const word = `0x${"0".repeat(62)}ff` as const;

describe("Test serializeBlockReference", () => {
    it("should default to latest", () => {
        expect(serializeBlockReference()).toBe("latest");
    });

    it("should serialize block numbers as hex quantities", () => {
        expect(serializeBlockReference(19000000n)).toBe("0x121eac0");
        expect(serializeBlockReference(0n)).toBe("0x0");
    });

    it("should pass block tags through", () => {
        expect(serializeBlockReference("pending")).toBe("pending");
        expect(serializeBlockReference("finalized")).toBe("finalized");
    });

    it("should serialize block hashes as EIP-1898 identifiers", () => {
        const blockHash = `0x${"ab".repeat(32)}` as const;
        expect(serializeBlockReference({ blockHash })).toEqual({ blockHash });
        expect(serializeBlockReference({ blockHash, requireCanonical: true })).toEqual({
            blockHash,
            requireCanonical: true,
        });
    });
});

describe("Test serializeStateOverride", () => {
    it("should serialize account overrides with hex quantities", () => {
        expect(
            serializeAccountOverride({ balance: 10n ** 18n, nonce: 5, code: "0x6080", state: {} }),
        ).toEqual({
            balance: "0xde0b6b3a7640000",
            nonce: "0x5",
            code: "0x6080",
            state: {},
        });
    });

    it("should key overrides by lower cased address", () => {
        expect(
            serializeStateOverride({
                [target]: { stateDiff: { [slot]: word } },
            }),
        ).toEqual({
            "0xca11bde05977b3631167028862be2a173976ca11": { stateDiff: { [slot]: word } },
        });
    });

    it("should omit unset fields", () => {
        expect(serializeAccountOverride({})).toEqual({});
    });
});

describe("Test formatCallRequest", () => {
    it("should place the payload per input kind", () => {
        expect(formatCallRequest(target, "0x1234", "input")).toEqual({
            to: target,
            input: "0x1234",
        });
        expect(formatCallRequest(target, "0x1234", "data")).toEqual({
            to: target,
            data: "0x1234",
        });
        expect(formatCallRequest(target, "0x1234", "both")).toEqual({
            to: target,
            input: "0x1234",
            data: "0x1234",
        });
    });

    it("should include value only when non zero", () => {
        expect(formatCallRequest(target, "0x", "input", 0n)).toEqual({ to: target, input: "0x" });
        expect(formatCallRequest(target, "0x", "input", 256n)).toEqual({
            to: target,
            input: "0x",
            value: "0x100",
        });
    });
});
