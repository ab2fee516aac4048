import { Hex, parseAbiItem } from "viem";

/**
 * Base error class of the dynamic multicall library, every error produced by
 * this library extends it.
 *
 * @remarks
 * The optional `cause` property can be used to attach the original error or
 * any relevant context that led to this error.
 *
 * @example
 * ```typescript
 * // without cause
 * throw new MulticallBaseError("msg");
 *
 * // with cause
 * throw new MulticallBaseError("msg", originalError);
 * ```
 */
export class MulticallBaseError extends Error {
    cause?: unknown;
    constructor(message: string, cause?: unknown) {
        super(message);
        this.cause = cause;
        this.name = "MulticallBaseError";
    }
}

/** Specifies error severity for otel reports */
export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
}

/** Represents a decoded solidity error type */
export type DecodedErrorType = {
    name: string;
    args: readonly unknown[];
};

/** Raw error type extracted from an rpc error */
export type RawRpcError = {
    code?: number;
    message?: string;
    data?: string | number;
};

/** Represents a failed call item of an aggregation, identified by its position */
export type CallFailure = {
    /** Position of the call in the aggregation */
    index: number;
    /** Raw revert data returned by the call */
    returnData: Hex;
};

/** Function selector pattern */
export const SELECTOR_PATTERN = /^0x[a-fA-F0-9]{8}$/;

/** Public function/error signature registry */
export const SELECTOR_REGISTRY = "https://api.openchain.xyz/signature-database/v1/lookup" as const;

/** Solidity Error(string) abi, thrown by require() and revert() with a reason */
export const ERROR_STRING_ABI = parseAbiItem("error Error(string message)");

/** Solidity Error(string) selector */
export const ERROR_STRING_SELECTOR = "0x08c379a0" as const;

/** Solidity Panic(uint256) abi */
export const PANIC_ABI = parseAbiItem("error Panic(uint256 code)");

/** Solidity Panic(uint256) selector */
export const PANIC_SELECTOR = "0x4e487b71" as const;

/** Solidity panic codes and their reasons */
export const PANIC_REASONS: Record<number, string> = {
    0x00: "generic compiler inserted panic",
    0x01: "asserted with an argument that evaluates to false",
    0x11: "arithmetic operation resulted in underflow or overflow outside of an unchecked block",
    0x12: "division or modulo by zero",
    0x21: "converted a value that is too big or negative into an enum type",
    0x22: "accessed a storage byte array that is incorrectly encoded",
    0x31: "called .pop() on an empty array",
    0x32: "accessed an array, bytesN or an array slice at an out-of-bounds or negative index",
    0x41: "allocated too much memory or created an array that is too large",
    0x51: "called a zero-initialized variable of internal function type",
};
