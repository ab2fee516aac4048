import { validateArgs } from "./validate";
import { CodecError, CodecErrorType } from "./error";
import { DynValue, isDynValue, Result } from "../common";
import {
    Abi,
    Hex,
    AbiFunction,
    parseAbiItem,
    encodeFunctionData,
    toFunctionSelector,
    decodeAbiParameters,
} from "viem";

export * from "./error";

/**
 * Runtime description of a callable, its name and ordered input/output
 * parameter types, which drives encoding and decoding of a call
 */
export type Signature = AbiFunction;

/** Matches human-readable abi items that start with their kind keyword */
const ABI_ITEM_KEYWORD_PATTERN = /^(function|event|error|constructor|fallback|receive)\b/;

/**
 * Parses a human-readable function signature, the `function` keyword is optional
 * @param signature - The signature, e.g. `function balanceOf(address owner) view returns (uint256)`
 */
export function parseSignature(signature: string): Result<Signature, CodecError> {
    const sig = signature.trim();
    try {
        const item = parseAbiItem(ABI_ITEM_KEYWORD_PATTERN.test(sig) ? sig : `function ${sig}`);
        if (item.type !== "function") {
            return Result.err(
                new CodecError(
                    `expected a function signature, got ${item.type}`,
                    CodecErrorType.InvalidSignature,
                ),
            );
        }
        return Result.ok(item);
    } catch (error) {
        return Result.err(
            new CodecError(
                `failed to parse signature: ${signature}`,
                CodecErrorType.InvalidSignature,
                error,
            ),
        );
    }
}

/** Returns the 4 bytes selector of the given signature */
export function selectorOf(signature: Signature): Hex {
    return toFunctionSelector(signature);
}

/**
 * Encodes the given arguments as a selector prefixed call payload of the given signature,
 * the arguments are checked against the declared input types first and are not coerced
 * @param signature - The function signature
 * @param args - The ordered argument values
 */
export function encodeInput(
    signature: Signature,
    args: readonly DynValue[],
): Result<Hex, CodecError> {
    const mismatch = validateArgs(signature.inputs, args);
    if (mismatch) {
        return Result.err(
            new CodecError(
                `failed to encode arguments of ${signature.name}`,
                CodecErrorType.EncodeFailed,
                mismatch,
            ),
        );
    }
    const abi: Abi = [signature];
    try {
        return Result.ok(encodeFunctionData({ abi, functionName: signature.name, args }));
    } catch (error) {
        return Result.err(
            new CodecError(
                `failed to encode arguments of ${signature.name}`,
                CodecErrorType.EncodeFailed,
                error,
            ),
        );
    }
}

/**
 * Decodes the given return data into the ordered output values of the given
 * signature, a single output is returned as a one item list
 * @param signature - The function signature
 * @param data - The raw return data
 */
export function decodeOutput(
    signature: Signature,
    data: Hex,
): Result<readonly DynValue[], CodecError> {
    try {
        const values = decodeAbiParameters(signature.outputs, data);
        if (!values.every(isDynValue)) {
            return Result.err(
                new CodecError(
                    `decoded unsupported value type for ${signature.name}`,
                    CodecErrorType.DecodeFailed,
                ),
            );
        }
        return Result.ok(values);
    } catch (error) {
        return Result.err(
            new CodecError(
                `failed to decode return data of ${signature.name}`,
                CodecErrorType.DecodeFailed,
                error,
            ),
        );
    }
}
