import { MulticallBaseError } from "../error";

/** Enumerates the possible error types that can occur within the signature codec */
export enum CodecErrorType {
    EncodeFailed,
    DecodeFailed,
    InvalidSignature,
}

/**
 * Represents an error type for the signature codec functionalities.
 * This error class extends the `MulticallBaseError` error class, with the `type`
 * property indicating the specific category of the error, as defined by the
 * `CodecErrorType` enum. The `cause` property holds the underlying viem error.
 *
 * @example
 * ```typescript
 * // without cause
 * throw new CodecError("msg", CodecErrorType);
 *
 * // with cause
 * throw new CodecError("msg", CodecErrorType, originalError);
 * ```
 */
export class CodecError extends MulticallBaseError {
    type: CodecErrorType;
    constructor(message: string, type: CodecErrorType, cause?: unknown) {
        super(message, cause);
        this.type = type;
        this.name = "CodecError";
    }
}
