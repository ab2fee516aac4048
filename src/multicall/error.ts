import { MulticallBaseError } from "../error";

/** Enumerates the possible error types that abort a multicall aggregation */
export enum MulticallErrorType {
    /** A call's arguments do not match its signature, no network call was made */
    EncodeFailed,
    /** The underlying read call failed, no results exist */
    TransportFailed,
    /** The reply holds a different number of results than the number of calls */
    CountMismatch,
    /** A successful call's return data does not match its signature */
    DecodeFailed,
}

/**
 * Represents an error type that aborts a whole multicall aggregation.
 * This error class extends the `MulticallBaseError` error class, with the `type`
 * property indicating the specific category of the error, as defined by the
 * `MulticallErrorType` enum, and the optional `index` identifying the call
 * that caused it.
 *
 * @example
 * ```typescript
 * // without cause
 * throw new MulticallError("msg", MulticallErrorType);
 *
 * // with cause and the index of the offending call
 * throw new MulticallError("msg", MulticallErrorType, originalError, 2);
 * ```
 */
export class MulticallError extends MulticallBaseError {
    type: MulticallErrorType;
    index?: number;
    constructor(message: string, type: MulticallErrorType, cause?: unknown, index?: number) {
        super(message, cause);
        this.type = type;
        this.index = index;
        this.name = "MulticallError";
    }
}
