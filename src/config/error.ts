import { MulticallBaseError } from "../error/types";

/** Enumerates the possible error types that can occur within the multicall options */
export enum MulticallOptionsErrorType {
    ValidationError,
    YamlParseError,
    ReadFileError,
}

/**
 * Represents an error type for the multicall options.
 * This error class extends the `MulticallBaseError` error class, with the `type`
 * property indicates the specific category of the error, as defined by the
 * `MulticallOptionsErrorType` enum. The optional `cause` property can be used to
 * attach the original error or any relevant context that led to this error.
 *
 * @example
 * ```typescript
 * // without cause
 * throw new MulticallOptionsError("msg", MulticallOptionsErrorType);
 *
 * // with cause
 * throw new MulticallOptionsError("msg", MulticallOptionsErrorType, originalError);
 * ```
 */
export class MulticallOptionsError extends MulticallBaseError {
    type: MulticallOptionsErrorType;
    constructor(message: string, type: MulticallOptionsErrorType, cause?: unknown) {
        super(message, cause);
        this.type = type;
        this.name = "MulticallOptionsError";
    }
}
