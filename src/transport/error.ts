import { MulticallBaseError } from "../error";

/** Enumerates the possible error types that can occur within the call transport */
export enum TransportErrorType {
    InvalidResponse,
}

/**
 * Represents an error type for the call transport functionalities.
 * This error class extends the `MulticallBaseError` error class, with the `type`
 * property indicating the specific category of the error, as defined by the
 * `TransportErrorType` enum.
 */
export class TransportError extends MulticallBaseError {
    type: TransportErrorType;
    constructor(message: string, type: TransportErrorType, cause?: unknown) {
        super(message, cause);
        this.type = type;
        this.name = "TransportError";
    }
}
