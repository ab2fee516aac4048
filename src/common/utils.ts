import { BlockReference } from "./types";

/**
 * Json serializer function for handling bigint type
 */
export function withBigintSerializer(_k: string, v: unknown) {
    if (typeof v == "bigint") {
        return v.toString();
    } else if (v instanceof Set) {
        return Array.from(v);
    } else {
        return v;
    }
}

/**
 * Serializes a block reference into a string suitable for logs and span attributes
 * @param block - The block reference
 */
export function blockToString(block: BlockReference): string {
    if (typeof block === "bigint") return block.toString();
    if (typeof block === "string") return block;
    return block.blockHash;
}

/**
 * Normalizes a thrown value into an Error instance
 * @param value - The thrown value
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) return value;
    if (typeof value === "string") return new Error(value);
    return new Error(JSON.stringify(value, withBigintSerializer) ?? String(value));
}
