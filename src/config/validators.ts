import assert from "assert";
import { Address, BlockTag, getAddress, Hex, isAddress, isHex } from "viem";
import { MulticallOptionsError, MulticallOptionsErrorType } from "./error";
import { AccountOverride, BlockReference, InputKind, StateOverrideSet } from "../common";

/** Integer pattern */
export const INT_PATTERN = /^[0-9]+$/;

/** Solidity hash pattern */
export const HASH_PATTERN = /^0x[a-fA-F0-9]{64}$/;

/** Known block tags */
export const BLOCK_TAGS = ["latest", "earliest", "pending", "safe", "finalized"] as const;

/** Known payload field conventions */
export const INPUT_KINDS = ["input", "data", "both"] as const;

/** Provides methods to parse and validate yaml config fields */
export namespace Validator {
    /** Resolves config's address, returned in checksum form */
    export function resolveAddress(input: unknown, addressName: string, fallback: Address): Address {
        const address = readValue(input).value ?? fallback;
        assert(
            typeof address === "string" && isAddress(address, { strict: false }),
            validationError(`expected valid ${addressName} contract address`),
        );
        return getAddress(address);
    }

    /**
     * Resolves config's block reference, either an integer block number, a block tag
     * or a 32 bytes block hash with optional requireCanonical field
     */
    export function resolveBlock(input: unknown): BlockReference | undefined {
        if (isRecord(input)) {
            const blockHash = readValue(input.blockHash).value;
            assert(
                isHash(blockHash),
                validationError("expected a 32 bytes hex string for blockHash"),
            );
            const requireCanonical = resolveBool(
                input.requireCanonical,
                "expected a boolean value for requireCanonical",
            );
            return requireCanonical === undefined
                ? { blockHash }
                : { blockHash, requireCanonical };
        }

        const block = readValue(input).value;
        if (block === undefined) return undefined;
        if (typeof block === "bigint") return block;
        if (typeof block === "number" && Number.isSafeInteger(block) && block >= 0) {
            return BigInt(block);
        }
        if (typeof block === "string") {
            if (INT_PATTERN.test(block)) return BigInt(block);
            if (isBlockTag(block)) return block;
            if (isHash(block)) return { blockHash: block };
        }
        throw validationError(
            `expected block number, block hash or either of ${BLOCK_TAGS.join(", ")}`,
        );
    }

    /** Resolves config's payload field convention, default is "input" */
    export function resolveInputKind(input: unknown): InputKind {
        const kind = readValue(input).value ?? "input";
        const normalized = typeof kind === "string" ? kind.toLowerCase() : kind;
        const found = INPUT_KINDS.find((v) => v === normalized);
        assert(found, validationError(`expected either of ${INPUT_KINDS.join(", ")}`));
        return found;
    }

    /**
     * Resolves config's state overrides, a map of account address to its overrides
     * where `state` and `stateDiff` are mutually exclusive
     */
    export function resolveStateOverride(input: unknown): StateOverrideSet | undefined {
        if (input === undefined || input === null) return undefined;
        assert(isRecord(input), validationError("expected a map of address to account overrides"));

        const result: StateOverrideSet = {};
        for (const [key, value] of Object.entries(input)) {
            assert(
                isAddress(key, { strict: false }),
                validationError(`${key} is not a valid address`),
            );
            const address = getAddress(key);
            assert(!(address in result), validationError(`duplicate overrides for ${address}`));
            result[address] = resolveAccountOverride(value, address);
        }
        return result;
    }

    /** Resolves a single account's overrides */
    export function resolveAccountOverride(input: unknown, account: string): AccountOverride {
        assert(isRecord(input), validationError(`expected account overrides for ${account}`));

        const fields: { balance?: bigint; nonce?: number; code?: Hex } = {};
        const balance = readValue(input.balance).value;
        if (balance !== undefined) {
            assert(
                isIntegerLike(balance),
                validationError(`invalid balance for ${account}, must be an integer`),
            );
            fields.balance = BigInt(balance);
        }
        const nonce = readValue(input.nonce).value;
        if (nonce !== undefined) {
            assert(
                isIntegerLike(nonce) && Number.isSafeInteger(Number(nonce)),
                validationError(`invalid nonce for ${account}, must be an integer`),
            );
            fields.nonce = Number(nonce);
        }
        const code = readValue(input.code).value;
        if (code !== undefined) {
            assert(
                typeof code === "string" && isHex(code),
                validationError(`invalid code for ${account}, must be a hex string`),
            );
            fields.code = code;
        }
        const state = resolveSlots(input.state, `state of ${account}`);
        const stateDiff = resolveSlots(input.stateDiff, `stateDiff of ${account}`);
        assert(
            !(state && stateDiff),
            validationError(`only one of state or stateDiff should be specified for ${account}`),
        );

        if (state) return { ...fields, state };
        if (stateDiff) return { ...fields, stateDiff };
        return fields;
    }

    /** Resolves a storage slot to value map */
    export function resolveSlots(input: unknown, name: string): Record<Hex, Hex> | undefined {
        if (input === undefined || input === null) return undefined;
        assert(isRecord(input), validationError(`expected a map of slot to value for ${name}`));

        const slots: Record<Hex, Hex> = {};
        for (const [slot, value] of Object.entries(input)) {
            const resolved = readValue(value).value;
            assert(isHash(slot), validationError(`invalid slot ${slot} in ${name}`));
            assert(
                isHash(resolved),
                validationError(`invalid value for slot ${slot} in ${name}`),
            );
            slots[slot] = resolved;
        }
        return slots;
    }

    /** Resolves config's optional boolean value */
    export function resolveBool(input: unknown, exception: string): boolean | undefined {
        const bool = readValue(input).value;
        if (bool === undefined) return undefined;
        if (typeof bool === "boolean") return bool;
        assert(bool === "true" || bool === "false", validationError(exception));
        return bool === "true";
    }
}

/**
 * Reads the given value, if it is a string starting with `$` the value is read
 * from the environment variable with the rest of the string as its name
 */
export function readValue(value: unknown): { isEnv: boolean; value: unknown } {
    if (typeof value === "string" && value.startsWith("$")) {
        const env = process.env[value.slice(1)];
        if (env !== undefined && env !== "" && !/^\s*$/.test(env)) {
            return { isEnv: true, value: env };
        } else {
            return { isEnv: true, value: undefined };
        }
    }
    return { isEnv: false, value };
}

/** Checks if the given value is a plain object */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHash(value: unknown): value is Hex {
    return typeof value === "string" && isHex(value) && HASH_PATTERN.test(value);
}

function isBlockTag(value: string): value is BlockTag {
    return BLOCK_TAGS.some((tag) => tag === value);
}

function isIntegerLike(value: unknown): value is string | number | bigint {
    if (typeof value === "bigint") return value >= 0n;
    if (typeof value === "number") return Number.isSafeInteger(value) && value >= 0;
    return typeof value === "string" && INT_PATTERN.test(value);
}

function validationError(msg: string): MulticallOptionsError {
    return new MulticallOptionsError(msg, MulticallOptionsErrorType.ValidationError);
}
