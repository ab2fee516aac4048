import { parse } from "yaml";
import { readFileSync } from "fs";
import { Address } from "viem";
import { isRecord, Validator } from "./validators";
import { MulticallOptionsError, MulticallOptionsErrorType } from "./error";
import { ABI, BlockReference, InputKind, Result, StateOverrideSet } from "../common";

/** Dynamic multicall yaml configurations */
export type MulticallOptions = {
    /** Multicall3 contract address, default is the canonical deployment address */
    address: Address;
    /** Optional block to evaluate the aggregations against, default is latest */
    block?: BlockReference;
    /** Payload field convention of the read calls, default is "input" */
    inputKind: InputKind;
    /** Optional call-scoped account overrides */
    stateOverride?: StateOverrideSet;
};

/** Provides methods to instantiate and validate MulticallOptions */
export namespace MulticallOptions {
    /**
     * Instantiates and validates configurations details from the given yaml file path
     * @param path - The path to the yaml config file
     */
    export function tryFromYamlPath(path: string): Result<MulticallOptions, MulticallOptionsError> {
        let content: string;
        try {
            content = readFileSync(path, { encoding: "utf8" });
        } catch (error) {
            return Result.err(
                new MulticallOptionsError(
                    "Failed to read the given yaml file",
                    MulticallOptionsErrorType.ReadFileError,
                    error,
                ),
            );
        }
        return MulticallOptions.tryFromYamlString(content);
    }

    /**
     * Instantiates and validates configurations details from the given yaml string
     * @param yaml - The yaml string
     */
    export function tryFromYamlString(yaml: string): Result<MulticallOptions, MulticallOptionsError> {
        let obj: unknown;
        try {
            obj = parse(yaml, {
                intAsBigInt: true,
                // parse any number as string for unified validations
                reviver: (_k, v) =>
                    typeof v === "number" || typeof v === "bigint" ? v.toString() : v,
            });
        } catch (error) {
            return Result.err(
                new MulticallOptionsError(
                    "Failed to parse the given yaml string",
                    MulticallOptionsErrorType.YamlParseError,
                    error,
                ),
            );
        }
        return MulticallOptions.tryFrom(obj);
    }

    /**
     * Instantiates and validates configurations details from the given input,
     * an empty input resolves to the default options
     * @param input - The configuration object
     */
    export function tryFrom(input: unknown): Result<MulticallOptions, MulticallOptionsError> {
        const options = input ?? {};
        if (!isRecord(options)) {
            return Result.err(
                new MulticallOptionsError(
                    "expected a map of multicall options",
                    MulticallOptionsErrorType.ValidationError,
                ),
            );
        }
        try {
            return Result.ok({
                address: Validator.resolveAddress(
                    options.address,
                    "multicall",
                    ABI.Multicall3.Address,
                ),
                block: Validator.resolveBlock(options.block),
                inputKind: Validator.resolveInputKind(options.inputKind),
                stateOverride: Validator.resolveStateOverride(options.stateOverride),
            });
        } catch (error) {
            if (error instanceof MulticallOptionsError) return Result.err(error);
            return Result.err(
                new MulticallOptionsError(
                    "Failed to validate the given options",
                    MulticallOptionsErrorType.ValidationError,
                    error,
                ),
            );
        }
    }
}
