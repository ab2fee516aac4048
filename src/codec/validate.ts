import { DynValue } from "../common";
import { AbiParameter, isAddress, isHex } from "viem";

/** Matches array types, capturing the element type and the optional fixed length */
const ARRAY_TYPE_PATTERN = /^(.*)\[(\d*)\]$/;

/** Matches signed and unsigned integer types */
const INT_TYPE_PATTERN = /^u?int(\d*)$/;

/** Matches fixed size bytes types */
const FIXED_BYTES_TYPE_PATTERN = /^bytes(\d+)$/;

/**
 * Checks the given argument values against the declared parameters, recursing
 * into arrays and tuples, and returns an error describing the first mismatch
 * @param params - The declared parameters
 * @param args - The ordered argument values
 */
export function validateArgs(
    params: readonly AbiParameter[],
    args: readonly DynValue[],
): Error | undefined {
    if (params.length !== args.length) {
        return new Error(`expected ${params.length} arguments, got ${args.length}`);
    }
    for (const [i, param] of params.entries()) {
        const mismatch = checkValue(param, param.type, args[i], param.name || `#${i}`);
        if (mismatch) return new Error(mismatch);
    }
    return undefined;
}

/** Returns a description of the mismatch of the given value, if any */
function checkValue(
    param: AbiParameter,
    type: string,
    value: DynValue,
    path: string,
): string | undefined {
    const array = ARRAY_TYPE_PATTERN.exec(type);
    if (array) {
        const [, elementType, size] = array;
        if (!isDynArray(value)) return expected(path, type, value);
        if (size !== "" && value.length !== Number(size)) {
            return `${path}: expected ${size} items of ${elementType}, got ${value.length}`;
        }
        for (const [i, item] of value.entries()) {
            const mismatch = checkValue(param, elementType, item, `${path}[${i}]`);
            if (mismatch) return mismatch;
        }
        return undefined;
    }

    if (type === "tuple") {
        if (!("components" in param)) return `${path}: missing tuple components`;
        return checkTuple(param.components, value, path);
    }

    const int = INT_TYPE_PATTERN.exec(type);
    if (int) {
        if (typeof value === "bigint") return undefined;
        if (typeof value === "number" && Number.isSafeInteger(value)) return undefined;
        return expected(path, type, value);
    }

    const fixedBytes = FIXED_BYTES_TYPE_PATTERN.exec(type);
    if (fixedBytes) {
        if (typeof value !== "string" || !isHex(value, { strict: true })) {
            return expected(path, type, value);
        }
        const size = (value.length - 2) / 2;
        if (size !== Number(fixedBytes[1])) {
            return `${path}: expected ${type}, got ${size} bytes`;
        }
        return undefined;
    }

    switch (type) {
        case "bool":
            return typeof value === "boolean" ? undefined : expected(path, type, value);
        case "address":
            return typeof value === "string" && isAddress(value)
                ? undefined
                : expected(path, type, value);
        case "bytes":
            return typeof value === "string" &&
                isHex(value, { strict: true }) &&
                value.length % 2 === 0
                ? undefined
                : expected(path, type, value);
        case "string":
            return typeof value === "string" ? undefined : expected(path, type, value);
        default:
            return `${path}: unsupported type ${type}`;
    }
}

/** Checks a tuple given either as an ordered list or as an object keyed by component names */
function checkTuple(
    components: readonly AbiParameter[],
    value: DynValue,
    path: string,
): string | undefined {
    if (isDynArray(value)) {
        if (value.length !== components.length) {
            return `${path}: expected ${components.length} tuple items, got ${value.length}`;
        }
        for (const [i, component] of components.entries()) {
            const name = `${path}.${component.name || i}`;
            const mismatch = checkValue(component, component.type, value[i], name);
            if (mismatch) return mismatch;
        }
        return undefined;
    }
    if (typeof value !== "object") return expected(path, "tuple", value);
    for (const component of components) {
        if (!component.name) return `${path}: unnamed tuple components must be given as a list`;
        if (!(component.name in value)) return `${path}: missing tuple item ${component.name}`;
        const item = value[component.name];
        const mismatch = checkValue(component, component.type, item, `${path}.${component.name}`);
        if (mismatch) return mismatch;
    }
    return undefined;
}

function isDynArray(value: DynValue): value is readonly DynValue[] {
    return Array.isArray(value);
}

function expected(path: string, type: string, value: DynValue): string {
    return `${path}: expected ${type}, got ${isDynArray(value) ? "array" : typeof value}`;
}
