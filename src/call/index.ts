import { Address, Hex } from "viem";
import { DynValue, Result } from "../common";
import { CodecError, decodeOutput, encodeInput, parseSignature, Signature } from "../codec";

/** Parameters of {@link CallItem.from} */
export type CallItemParams = {
    /** The contract to call */
    target: Address;
    /** The function signature, either parsed or in human-readable form */
    signature: Signature | string;
    /** The ordered argument values, default is no arguments */
    args?: readonly DynValue[];
    /** Whether the aggregation should tolerate this call reverting, default is false */
    allowFailure?: boolean;
    /** Native asset amount to send with the call, default is 0 */
    value?: bigint;
};

/**
 * A single pending call of a multicall aggregation, its destination, argument
 * values and the function signature that drives encoding of the arguments and
 * decoding of the return data.
 *
 * Instances are immutable, the `with*` methods return a modified copy. The
 * arguments are not validated against the signature until the call is encoded.
 *
 * @example
 * ```typescript
 * const call = CallItem.from({
 *     target: token,
 *     signature: "function balanceOf(address owner) view returns (uint256)",
 *     args: [owner],
 * });
 * if (call.isOk()) {
 *     const tolerant = call.value.withAllowFailure(true);
 * }
 * ```
 */
export class CallItem {
    readonly target: Address;
    readonly args: readonly DynValue[];
    readonly allowFailure: boolean;
    readonly value: bigint;
    readonly signature: Signature;

    constructor(
        target: Address,
        args: readonly DynValue[],
        signature: Signature,
        allowFailure: boolean,
        value = 0n,
    ) {
        this.target = target;
        this.args = Object.freeze([...args]);
        this.signature = signature;
        this.allowFailure = allowFailure;
        this.value = value;
    }

    /**
     * Creates a call item from the given params, parsing the signature if it
     * is given in human-readable form
     */
    static from(params: CallItemParams): Result<CallItem, CodecError> {
        let signature: Signature;
        if (typeof params.signature === "string") {
            const parsed = parseSignature(params.signature);
            if (parsed.isErr()) return Result.err(parsed.error);
            signature = parsed.value;
        } else {
            signature = params.signature;
        }
        return Result.ok(
            new CallItem(
                params.target,
                params.args ?? [],
                signature,
                params.allowFailure ?? false,
                params.value ?? 0n,
            ),
        );
    }

    /** Returns a copy of this call with the given failure tolerance */
    withAllowFailure(allowFailure: boolean): CallItem {
        return new CallItem(this.target, this.args, this.signature, allowFailure, this.value);
    }

    /** Returns a copy of this call that sends the given native asset amount */
    withValue(value: bigint): CallItem {
        return new CallItem(this.target, this.args, this.signature, this.allowFailure, value);
    }

    /** Encodes the call payload */
    encode(): Result<Hex, CodecError> {
        return encodeInput(this.signature, this.args);
    }

    /**
     * Decodes the return data of this call
     * @param data - The raw return data
     */
    decode(data: Hex): Result<readonly DynValue[], CodecError> {
        return decodeOutput(this.signature, data);
    }

    /** Returns a loggable summary of this call, arguments are left out */
    toJSON() {
        return {
            target: this.target,
            function: this.signature.name,
            allowFailure: this.allowFailure,
            value: this.value.toString(),
        };
    }
}
