import { CallItem } from "../call";
import { MulticallOptions } from "../config";
import { SpanStatusCode } from "@opentelemetry/api";
import { CallTransport } from "../transport";
import { MulticallError, MulticallErrorType } from "./error";
import { MulticallLogger, PreAssembledSpan } from "../logger";
import { CallFailure, ErrorSeverity, errorSnapshot } from "../error";
import { Address, decodeAbiParameters, encodeFunctionData, Hex } from "viem";
import {
    ABI,
    Result,
    DynValue,
    InputKind,
    blockToString,
    BlockReference,
    StateOverrideSet,
} from "../common";

export * from "./error";

/** Result of a single call of an aggregation, its decoded outputs or its failure */
export type CallResult = Result<readonly DynValue[], CallFailure>;

/** The Multicall3 functions an aggregation can be performed with */
export type AggregateFunction = "aggregate3" | "aggregate3Value";

/** Configuration of a {@link DynamicMulticall} */
export type DynamicMulticallConfig = {
    /** Address of the Multicall3 contract, default is the canonical deployment */
    address?: Address;
    /** Optional block the aggregation is evaluated against, default is latest */
    block?: BlockReference;
    /** Optional call-scoped account overrides */
    stateOverride?: StateOverrideSet;
    /** The payload field convention, default is "input" */
    inputKind?: InputKind;
    /** Optional logger that aggregation reports are exported with */
    logger?: MulticallLogger;
    /** Optional initial calls */
    calls?: readonly CallItem[];
};

/**
 * Aggregates calls whose function signatures are only known at runtime into a
 * single Multicall3 read call and decodes each call's return data with its own
 * signature.
 *
 * Instances are immutable, every mutator returns a new instance that shares the
 * transport and configuration but owns its own list of calls. Results are
 * always in the same order and of the same count as the calls.
 *
 * @example
 * ```typescript
 * const multicall = new DynamicMulticall(RpcCallTransport.fromUrl(rpcUrl))
 *     .addCall(balanceOfCall)
 *     .addCall(totalSupplyCall);
 * const result = await multicall.aggregate();
 * if (result.isOk()) {
 *     for (const callResult of result.value) {
 *         if (callResult.isOk()) console.log(callResult.value);
 *         else console.log(`call ${callResult.error.index} reverted`);
 *     }
 * }
 * ```
 */
export class DynamicMulticall {
    readonly transport: CallTransport;
    readonly calls: readonly CallItem[];
    readonly address: Address;
    readonly block?: BlockReference;
    readonly stateOverride?: StateOverrideSet;
    readonly inputKind: InputKind;
    readonly logger?: MulticallLogger;

    constructor(transport: CallTransport, config: DynamicMulticallConfig = {}) {
        this.transport = transport;
        this.calls = Object.freeze([...(config.calls ?? [])]);
        this.address = config.address ?? ABI.Multicall3.Address;
        this.block = config.block;
        this.stateOverride = config.stateOverride;
        this.inputKind = config.inputKind ?? "input";
        this.logger = config.logger;
    }

    /**
     * Creates an instance configured by the given validated options
     * @param transport - The call transport
     * @param options - The multicall options
     * @param logger - Optional logger
     */
    static fromOptions(
        transport: CallTransport,
        options: MulticallOptions,
        logger?: MulticallLogger,
    ): DynamicMulticall {
        return new DynamicMulticall(transport, {
            address: options.address,
            block: options.block,
            stateOverride: options.stateOverride,
            inputKind: options.inputKind,
            logger,
        });
    }

    /** Number of calls */
    get length(): number {
        return this.calls.length;
    }

    /** Checks if there are no calls */
    isEmpty(): boolean {
        return this.calls.length === 0;
    }

    /** Returns an instance with the given call appended */
    addCall(call: CallItem): DynamicMulticall {
        return this.copy({ calls: [...this.calls, call] });
    }

    /** Returns an instance with the given calls appended in order */
    addCalls(calls: readonly CallItem[]): DynamicMulticall {
        return this.copy({ calls: [...this.calls, ...calls] });
    }

    /** Returns an instance with no calls and the same configuration */
    clear(): DynamicMulticall {
        return this.copy({ calls: [] });
    }

    /** Returns an instance that aggregates through the Multicall3 contract at the given address */
    withAddress(address: Address): DynamicMulticall {
        return this.copy({ address });
    }

    /** Returns an instance that evaluates the aggregation against the given block */
    withBlock(block?: BlockReference): DynamicMulticall {
        return this.copy({ block });
    }

    /** Returns an instance that applies the given account overrides to the aggregation */
    withStateOverride(stateOverride?: StateOverrideSet): DynamicMulticall {
        return this.copy({ stateOverride });
    }

    /** Returns an instance that sends the payload in the given field(s) */
    withInputKind(inputKind: InputKind): DynamicMulticall {
        return this.copy({ inputKind });
    }

    /** Returns an instance that exports its reports with the given logger */
    withLogger(logger?: MulticallLogger): DynamicMulticall {
        return this.copy({ logger });
    }

    /**
     * Performs the calls through Multicall3 `aggregate3`. Each call's value is
     * ignored, use {@link aggregateValue} to send values.
     *
     * Encode, transport, count and decode errors abort the whole aggregation,
     * a reverted call is returned inline as a failure at its position. With no
     * calls it resolves to an empty list without calling the transport.
     *
     * The report's status message is built offline, custom error selectors in
     * revert data are left raw rather than resolved through the signature registry.
     */
    async aggregate(): Promise<Result<CallResult[], MulticallError>> {
        return this.execute("aggregate3");
    }

    /**
     * Performs the calls through Multicall3 `aggregate3Value`, each call sends
     * its value and the outer call carries the sum of all values. Errors and
     * the empty case behave as in {@link aggregate}.
     */
    async aggregateValue(): Promise<Result<CallResult[], MulticallError>> {
        return this.execute("aggregate3Value");
    }

    /** Runs the aggregation and reports it */
    private async execute(
        functionName: AggregateFunction,
    ): Promise<Result<CallResult[], MulticallError>> {
        const report = new PreAssembledSpan(
            functionName === "aggregate3" ? "multicall-aggregate3" : "multicall-aggregate3-value",
        );
        report.setAttr("multicall.address", this.address);
        report.setAttr("multicall.callCount", this.calls.length);
        report.setAttr("multicall.inputKind", this.inputKind);
        if (this.block !== undefined) {
            report.setAttr("multicall.block", blockToString(this.block));
        }
        if (this.stateOverride) {
            report.setAttr("multicall.overrides", Object.keys(this.stateOverride).length);
        }

        const result = await this.run(functionName, report);
        if (result.isErr()) {
            report.setAttr("multicall.errorType", MulticallErrorType[result.error.type]);
            report.setAttr(
                "severity",
                result.error.type === MulticallErrorType.TransportFailed
                    ? ErrorSeverity.MEDIUM
                    : ErrorSeverity.HIGH,
            );
            if (result.error.index !== undefined) {
                report.setAttr("multicall.errorIndex", result.error.index);
            }
            report.recordException(result.error);
            report.setStatus({
                code: SpanStatusCode.ERROR,
                message: await errorSnapshot("Multicall aggregation failed", result.error, false),
            });
        } else {
            const failed = result.value.flatMap((v) => (v.isErr() ? [v.error.index] : []));
            report.setAttr("multicall.failedCalls", failed);
            report.setStatus({ code: SpanStatusCode.OK });
        }
        report.end();
        this.logger?.exportPreAssembledSpan(report);

        return result;
    }

    /** Encodes, calls and decodes, in that order */
    private async run(
        functionName: AggregateFunction,
        report: PreAssembledSpan,
    ): Promise<Result<CallResult[], MulticallError>> {
        if (this.isEmpty()) return Result.ok([]);

        // encode every call in order, the first failure aborts before any network call
        const callDatas: Hex[] = [];
        for (const [index, call] of this.calls.entries()) {
            const encoded = call.encode();
            if (encoded.isErr()) {
                return Result.err(
                    new MulticallError(
                        `failed to encode call at index ${index} (${call.signature.name})`,
                        MulticallErrorType.EncodeFailed,
                        encoded.error,
                        index,
                    ),
                );
            }
            callDatas.push(encoded.value);
        }

        const payload = this.encodePayload(functionName, callDatas);
        if (payload.isErr()) return Result.err(payload.error);

        let data: Hex;
        try {
            data = await this.transport.simulateCall({
                to: this.address,
                input: payload.value.input,
                inputKind: this.inputKind,
                value: payload.value.value,
                block: this.block,
                stateOverride: this.stateOverride,
            });
        } catch (error) {
            return Result.err(
                new MulticallError(
                    "multicall transport call failed",
                    MulticallErrorType.TransportFailed,
                    error,
                ),
            );
        }

        let replies: readonly { success: boolean; returnData: Hex }[];
        try {
            [replies] = decodeAbiParameters(ABI.Multicall3.Primary.MulticallResults, data);
        } catch (error) {
            return Result.err(
                new MulticallError(
                    `failed to decode ${functionName} reply`,
                    MulticallErrorType.DecodeFailed,
                    error,
                ),
            );
        }
        if (replies.length !== this.calls.length) {
            return Result.err(
                new MulticallError(
                    `expected ${this.calls.length} results, got ${replies.length}`,
                    MulticallErrorType.CountMismatch,
                ),
            );
        }

        const results: CallResult[] = [];
        const unexpectedFailures: number[] = [];
        for (const [index, reply] of replies.entries()) {
            const call = this.calls[index];
            if (!reply.success) {
                // a call that may not fail should have reverted the whole batch
                if (!call.allowFailure) unexpectedFailures.push(index);
                results.push(Result.err({ index, returnData: reply.returnData }));
                continue;
            }
            const decoded = call.decode(reply.returnData);
            if (decoded.isErr()) {
                return Result.err(
                    new MulticallError(
                        `failed to decode result at index ${index} (${call.signature.name})`,
                        MulticallErrorType.DecodeFailed,
                        decoded.error,
                        index,
                    ),
                );
            }
            results.push(Result.ok(decoded.value));
        }
        if (unexpectedFailures.length) {
            report.setAttr("multicall.unexpectedFailures", unexpectedFailures);
        }

        return Result.ok(results);
    }

    /** Builds the outer Multicall3 call payload and the total value it carries */
    private encodePayload(
        functionName: AggregateFunction,
        callDatas: Hex[],
    ): Result<{ input: Hex; value?: bigint }, MulticallError> {
        try {
            if (functionName === "aggregate3") {
                const input = encodeFunctionData({
                    abi: ABI.Multicall3.Primary.Multicall,
                    functionName,
                    args: [
                        this.calls.map((call, i) => ({
                            target: call.target,
                            allowFailure: call.allowFailure,
                            callData: callDatas[i],
                        })),
                    ],
                });
                return Result.ok({ input });
            }
            const input = encodeFunctionData({
                abi: ABI.Multicall3.Primary.Multicall,
                functionName,
                args: [
                    this.calls.map((call, i) => ({
                        target: call.target,
                        allowFailure: call.allowFailure,
                        value: call.value,
                        callData: callDatas[i],
                    })),
                ],
            });
            const value = this.calls.reduce((total, call) => total + call.value, 0n);
            return Result.ok({ input, value });
        } catch (error) {
            return Result.err(
                new MulticallError(
                    `failed to encode ${functionName} payload`,
                    MulticallErrorType.EncodeFailed,
                    error,
                ),
            );
        }
    }

    /** Returns a new instance with the given changes */
    private copy(changes: DynamicMulticallConfig): DynamicMulticall {
        return new DynamicMulticall(this.transport, {
            address: this.address,
            block: this.block,
            stateOverride: this.stateOverride,
            inputKind: this.inputKind,
            logger: this.logger,
            calls: this.calls,
            ...changes,
        });
    }
}
