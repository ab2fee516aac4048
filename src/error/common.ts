import { AxiosError } from "axios";
import { BaseError, isHex } from "viem";
import { tryDecodeError } from "./decoder";
import { withBigintSerializer } from "../common";
import { MulticallBaseError, RawRpcError } from "./types";

/**
 * Constructs a snapshot from the given error which is mainly used for reporting
 * @param header - The header to include in the snapshot
 * @param err - The error to construct snapshot from
 * @param lookup - Whether revert data of custom errors may be resolved through the signature registry
 */
export async function errorSnapshot(
    header: string,
    err: unknown,
    lookup = true,
): Promise<string> {
    const message = [header];
    if (err instanceof MulticallBaseError) {
        if (err.cause) message.push(await errorSnapshot(err.message, err.cause, lookup));
        else message.push(`Reason: ${err.message}`);
    } else if (err instanceof BaseError) {
        const org = getRpcError(err);
        if (err.shortMessage) message.push(`Reason: ${err.shortMessage}`);
        if (err.name) message.push(`Error: ${err.name}`);
        if (err.details) message.push(`Details: ${err.details}`);
        if (typeof org.code === "number") message.push(`RPC Error Code: ${org.code}`);
        if (typeof org.message === "string") message.push(`RPC Error Msg: ${org.message}`);
        if (typeof org.data === "string" && isHex(org.data, { strict: true })) {
            const decoded = await tryDecodeError(org.data, lookup);
            if (decoded.isOk()) {
                message.push("Error Name: " + decoded.value.name);
                if (decoded.value.args.length) {
                    message.push(
                        "Error Args: " + JSON.stringify(decoded.value.args, withBigintSerializer),
                    );
                }
            } else {
                message.push("Error Raw Data: " + org.data);
            }
        }
    } else if (err instanceof AxiosError) {
        if (err.message) {
            message.push("Reason: " + err.message);
        }
        if (err.code) {
            message.push("Code: " + err.code);
        }
    } else if (err instanceof Error) {
        message.push("Reason: " + err.message);
    } else if (typeof err === "string") {
        message.push("Reason: " + err);
    } else {
        try {
            message.push("Reason: " + String(err));
        } catch {
            message.push("Reason: unknown error type");
        }
    }
    return message.join("\n");
}

/**
 * Extracts the original rpc error fields from a (possibly nested) viem error
 * @param error - The error
 */
export function getRpcError(error: unknown, breaker = 0): RawRpcError {
    const result: RawRpcError = {};
    // avoid infinite loops if the error is recursive
    if (breaker > 10 || typeof error !== "object" || error === null) return result;

    if ("cause" in error && typeof error.cause === "object" && error.cause !== null) {
        const org = getRpcError(error.cause, breaker + 1);
        if (typeof org.code === "number") result.code = org.code;
        if (typeof org.message === "string") result.message = org.message;
        if (org.data !== undefined) result.data = org.data;
    } else {
        const message =
            "message" in error && typeof error.message === "string" ? error.message : undefined;
        if ("code" in error && typeof error.code === "number") {
            result.code = error.code;
            // include msg only if code exists
            if (message !== undefined) result.message = message;
        }
        if ("data" in error && (typeof error.data === "string" || typeof error.data === "number")) {
            result.data = error.data;
            // include msg only if data exists
            if (message !== undefined) result.message = message;
        }
    }
    return result;
}
