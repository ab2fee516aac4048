import { CallItem } from ".";
import { parseSignature } from "../codec";
import { describe, it, expect, assert } from "vitest";

const token = "0x2222222222222222222222222222222222222222";
const owner = "0x1111111111111111111111111111111111111111";
const balanceOfSig = "function balanceOf(address owner) view returns (uint256)";

function balanceOf() {
    const result = parseSignature(balanceOfSig);
    assert(result.isOk());
    return result.value;
}

describe("Test CallItem", () => {
    it("should store the given fields with zero value", () => {
        const signature = balanceOf();
        const call = new CallItem(token, [owner], signature, true);

        expect(call.target).toBe(token);
        expect(call.args).toEqual([owner]);
        expect(call.signature).toBe(signature);
        expect(call.allowFailure).toBe(true);
        expect(call.value).toBe(0n);
    });

    it("should not validate arguments at construction", () => {
        const call = new CallItem(token, [], balanceOf(), false);

        const encoded = call.encode();
        assert(encoded.isErr());
        expect(encoded.error.message).toBe("failed to encode arguments of balanceOf");
    });

    it("should return modified copies from with methods", () => {
        const call = new CallItem(token, [owner], balanceOf(), false);
        const tolerant = call.withAllowFailure(true);
        const funded = tolerant.withValue(5n);

        expect(call.allowFailure).toBe(false);
        expect(call.value).toBe(0n);
        expect(tolerant).not.toBe(call);
        expect(tolerant.allowFailure).toBe(true);
        expect(tolerant.value).toBe(0n);
        expect(funded.allowFailure).toBe(true);
        expect(funded.value).toBe(5n);
        expect(funded.target).toBe(token);
        expect(funded.signature).toBe(call.signature);
    });

    it("should not share the arguments with the caller", () => {
        const args = [owner];
        const call = new CallItem(token, args, balanceOf(), false);
        args.push(token);

        expect(call.args).toEqual([owner]);
        expect(Object.isFrozen(call.args)).toBe(true);
    });

    it("should create from human-readable signature", () => {
        const result = CallItem.from({ target: token, signature: balanceOfSig, args: [owner] });

        assert(result.isOk());
        expect(result.value.signature.name).toBe("balanceOf");
        expect(result.value.allowFailure).toBe(false);
        expect(result.value.value).toBe(0n);

        const encoded = result.value.encode();
        assert(encoded.isOk());
        expect(encoded.value).toBe(
            "0x70a08231" + "0".repeat(24) + "1111111111111111111111111111111111111111",
        );
    });

    it("should fail to create from invalid signature", () => {
        const result = CallItem.from({ target: token, signature: "not a signature(" });

        assert(result.isErr());
        expect(result.error.message).toBe("failed to parse signature: not a signature(");
    });

    it("should decode return data with its signature", () => {
        const call = new CallItem(token, [owner], balanceOf(), false);
        const result = call.decode(`0x${"0".repeat(62)}2a`);

        assert(result.isOk());
        expect(result.value).toEqual([42n]);
    });

    it("should serialize a summary", () => {
        const call = new CallItem(token, [owner], balanceOf(), true, 7n);

        expect(JSON.stringify(call)).toBe(
            `{"target":"${token}","function":"balanceOf","allowFailure":true,"value":"7"}`,
        );
    });
});
