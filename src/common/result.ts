/** Represents the success variant of a {@link Result} */
export class Ok<T, E> {
    readonly ok = true as const;
    readonly value: T;
    readonly error: undefined = undefined;

    constructor(value: T) {
        this.value = value;
    }

    isOk(): this is Ok<T, E> {
        return true;
    }

    isErr(): this is Err<T, E> {
        return false;
    }
}

/** Represents the error variant of a {@link Result} */
export class Err<T, E> {
    readonly ok = false as const;
    readonly value: undefined = undefined;
    readonly error: E;

    constructor(error: E) {
        this.error = error;
    }

    isOk(): this is Ok<T, E> {
        return false;
    }

    isErr(): this is Err<T, E> {
        return true;
    }
}

/**
 * Holds either a success value or an error, used as the return type of fallible
 * operations instead of throwing
 *
 * @example
 * ```typescript
 * const result = parseSignature("function totalSupply() view returns (uint256)");
 * if (result.isErr()) {
 *     console.log(result.error.message);
 * } else {
 *     console.log(result.value.name);
 * }
 * ```
 */
export type Result<T, E> = Ok<T, E> | Err<T, E>;

export namespace Result {
    /** Creates a success result */
    export function ok<T, E = never>(value: T): Result<T, E> {
        return new Ok<T, E>(value);
    }

    /** Creates an error result */
    export function err<T = never, E = unknown>(error: E): Result<T, E> {
        return new Err<T, E>(error);
    }
}
