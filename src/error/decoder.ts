import assert from "assert";
import axios, { AxiosError } from "axios";
import { Result, toError } from "../common";
import { Hex, isHex, parseAbiItem, decodeErrorResult } from "viem";
import {
    PANIC_ABI,
    CallFailure,
    PANIC_REASONS,
    PANIC_SELECTOR,
    ERROR_STRING_ABI,
    SELECTOR_PATTERN,
    DecodedErrorType,
    SELECTOR_REGISTRY,
    ERROR_STRING_SELECTOR,
} from "./types";

/** Shape of the signature registry lookup response */
type SignatureRegistryResponse = {
    result?: {
        function?: Record<string, { name: string }[] | null | undefined>;
    };
};

/** Selector abi/sig cache at runtime */
export const SelectorCache = new Map<string, string[]>();

/**
 * Decodes the raw return data of a failed call item into its solidity error
 * @param failure - The failed call item
 */
export async function decodeCallFailure(
    failure: CallFailure,
): Promise<Result<DecodedErrorType, AxiosError | Error>> {
    if (failure.returnData === "0x") {
        return Result.err(new Error(`call at index ${failure.index} reverted without data`));
    }
    return tryDecodeError(failure.returnData);
}

/**
 * Tries to decode the given error data by running through known matching signatures
 * @param data - the error data
 * @param lookup - Whether to search the signature registry for custom error selectors,
 * when false only builtin solidity errors and cached selectors are decoded
 */
export async function tryDecodeError(
    data: string,
    lookup = true,
): Promise<Result<DecodedErrorType, AxiosError | Error>> {
    // check for validity of the data
    if (!data.startsWith("0x")) data = `0x${data}`;
    if (!isHex(data, { strict: true }) || data.length < 10) {
        return Result.err(new Error("invalid data, expected hex string with at least 4 bytes"));
    }

    // decode builtin solidity errors without a registry lookup
    const selector = data.slice(0, 10).toLowerCase();
    if (selector === PANIC_SELECTOR) {
        return tryDecodePanic(data);
    }
    if (selector === ERROR_STRING_SELECTOR) {
        return tryDecodeErrorString(data);
    }

    if (!lookup && !SelectorCache.has(selector)) {
        return Result.err(new Error(`unknown error selector: ${selector}`));
    }

    // search for the selector and return the decoded result if a match was found
    const signatures = await tryGetSignature(selector);
    if (signatures.isErr()) {
        return Result.err(signatures.error);
    }
    for (const sig of signatures.value) {
        try {
            const result = decodeErrorResult({ abi: [parseAbiItem("error " + sig)], data });
            return Result.ok({
                name: result.errorName,
                args: result.args ?? [],
            });
        } catch {
            // try the next signature with the same selector
        }
    }

    // reaching here means none of the signatures matched the given error data
    return Result.err(
        new Error(
            "Failed to decode the error as none of the known signatures matched with the error",
        ),
    );
}

/**
 * Tries to get the signature associated withe given selector, it first searches through
 * cached signatures and if no match was found, it tries to get it from registry, cache
 * it and return it
 * @param selector - The selector to search for
 */
export async function tryGetSignature(
    selector: string,
): Promise<Result<string[], AxiosError | Error>> {
    try {
        // check validity of the selector
        if (!selector.startsWith("0x")) selector = `0x${selector}`;
        selector = selector.toLowerCase();
        assert(
            SELECTOR_PATTERN.test(selector),
            `Invalid selector ${selector}, must be 4 bytes hex string`,
        );

        // check the cache first and try getting it from registry if not already cached
        const cachedSigs = SelectorCache.get(selector);
        if (cachedSigs) {
            return Result.ok(cachedSigs);
        }
        const registryQueryResult = await axios.get<SignatureRegistryResponse>(
            SELECTOR_REGISTRY,
            {
                headers: { accept: "application/json" },
                params: { filter: true, function: selector },
            },
        );

        // ensure valid, non-empty response
        const responseData = registryQueryResult?.data?.result?.function?.[selector];
        assert(Array.isArray(responseData), "Response from registry contains no valid results");
        assert(!!responseData.length, "Response from registry contains empty results");

        // store in cache
        const sigs = responseData.map((v) => v.name);
        SelectorCache.set(selector, sigs);

        return Result.ok(sigs);
    } catch (error) {
        return Result.err(toError(error));
    }
}

/**
 * Decodes the given error data as Panic(uint256) and returns the matching reason from solidity docs:
 * https://docs.soliditylang.org/en/latest/control-structures.html#panic-via-assert-and-error-via-require
 * @param data - The error data
 */
export function tryDecodePanic(data: Hex): Result<DecodedErrorType, Error> {
    try {
        const result = decodeErrorResult({ abi: [PANIC_ABI], data });
        const code = result.args[0];
        const reason =
            PANIC_REASONS[Number(code)] ?? `unknown reason with code: 0x${code.toString(16)}`;
        return Result.ok({
            name: "Panic",
            args: [reason],
        });
    } catch (error) {
        return Result.err(toError(error));
    }
}

/**
 * Decodes the given error data as Error(string), the error produced by
 * require() and revert() with a reason string
 * @param data - The error data
 */
export function tryDecodeErrorString(data: Hex): Result<DecodedErrorType, Error> {
    try {
        const result = decodeErrorResult({ abi: [ERROR_STRING_ABI], data });
        return Result.ok({
            name: "Error",
            args: [result.args[0]],
        });
    } catch (error) {
        return Result.err(toError(error));
    }
}
