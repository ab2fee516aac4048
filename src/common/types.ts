import { BlockTag, Hash, Hex } from "viem";

/**
 * A dynamically typed ABI value, the runtime representation of any solidity
 * type that the codec accepts as an argument and produces as a decoded output:
 * - `uintN`/`intN` as bigint, or number for sizes up to 48 bits when decoded
 * - `bool` as boolean
 * - `address`, `bytesN` and `bytes` as 0x prefixed hex strings
 * - `string` as string
 * - `T[]`/`T[k]` as arrays
 * - tuples as arrays, or as objects keyed by component name when decoded with named components
 */
export type DynValue =
    | bigint
    | number
    | boolean
    | string
    | readonly DynValue[]
    | { readonly [key: string]: DynValue };

/** Checks if the given value is a {@link DynValue} */
export function isDynValue(value: unknown): value is DynValue {
    switch (typeof value) {
        case "bigint":
        case "number":
        case "boolean":
        case "string":
            return true;
        case "object":
            if (value === null) return false;
            if (Array.isArray(value)) return value.every(isDynValue);
            return Object.values(value).every(isDynValue);
        default:
            return false;
    }
}

/**
 * Pins a read call to a chain state, either a block number, a block tag or
 * an EIP-1898 block hash identifier
 */
export type BlockReference =
    | bigint
    | BlockTag
    | {
          blockHash: Hash;
          requireCanonical?: boolean;
      };

/** Simulated changes applied to a single account for the duration of a call */
export type AccountOverride = {
    /** Fake balance in wei */
    balance?: bigint;
    /** Fake nonce */
    nonce?: number;
    /** Fake bytecode */
    code?: Hex;
} & (
    | {
          /** Replaces the whole account storage with the given slots */
          state?: Record<Hex, Hex>;
          stateDiff?: undefined;
      }
    | {
          state?: undefined;
          /** Patches the given slots, keeping the rest of the storage */
          stateDiff?: Record<Hex, Hex>;
      }
);

/** Set of call-scoped account overrides keyed by account address */
export type StateOverrideSet = Record<`0x${string}`, AccountOverride>;

/**
 * Specifies which transaction request field carries the call payload,
 * some nodes only read the legacy `data` field while others expect `input`
 */
export type InputKind = "input" | "data" | "both";
