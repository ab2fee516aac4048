import { ABI } from "../common";
import { Address, custom, decodeFunctionData, encodeAbiParameters, Hex, hexToBigInt, isHex } from "viem";

/** A sub-call as seen by a fake contract */
export type FakeContractCall = {
    data: Hex;
    value: bigint;
};

/** Outcome of a sub-call executed by a fake contract */
export type FakeCallOutcome = {
    success: boolean;
    returnData: Hex;
};

/** An in-memory contract, receives the call payload and returns its outcome */
export type FakeContract = (call: FakeContractCall) => FakeCallOutcome;

/** A JSON-RPC request received by the fake chain */
export type FakeRequest = {
    method: string;
    params?: unknown;
};

/**
 * In-process stand-in for a node that serves `eth_call` against a Multicall3
 * deployment and a table of in-memory contracts, used by tests through viem's
 * custom transport
 */
export class FakeChain {
    readonly contracts = new Map<string, FakeContract>();
    readonly requests: FakeRequest[] = [];
    readonly multicallAddress: Address;

    constructor(multicallAddress: Address = ABI.Multicall3.Address) {
        this.multicallAddress = multicallAddress;
    }

    /** Registers a contract at the given address */
    deploy(address: Address, contract: FakeContract): this {
        this.contracts.set(address.toLowerCase(), contract);
        return this;
    }

    /** Returns a viem transport that serves requests from this chain */
    transport() {
        return custom({
            request: async (request: FakeRequest) => this.handle(request),
        });
    }

    handle(request: FakeRequest): Hex {
        this.requests.push(request);
        if (request.method !== "eth_call") {
            throw new Error(`unsupported method: ${request.method}`);
        }
        const tx: unknown = Array.isArray(request.params) ? request.params[0] : undefined;
        if (typeof tx !== "object" || tx === null) throw new Error("missing call object");

        const to: unknown = "to" in tx ? tx.to : undefined;
        const input: unknown = "input" in tx ? tx.input : "data" in tx ? tx.data : undefined;
        const rawValue: unknown = "value" in tx ? tx.value : undefined;
        if (typeof to !== "string" || !isHex(input)) throw new Error("invalid call object");
        const value = isHex(rawValue) ? hexToBigInt(rawValue) : 0n;

        if (to.toLowerCase() !== this.multicallAddress.toLowerCase()) {
            const outcome = this.execute(to, input, value);
            if (!outcome.success) throw revertError(outcome.returnData);
            return outcome.returnData;
        }

        const decoded = decodeFunctionData({ abi: ABI.Multicall3.Primary.Multicall, data: input });
        const results: FakeCallOutcome[] = [];
        if (decoded.functionName === "aggregate3") {
            for (const call of decoded.args[0]) {
                const outcome = this.execute(call.target, call.callData, 0n);
                if (!outcome.success && !call.allowFailure) {
                    throw revertError(outcome.returnData);
                }
                results.push(outcome);
            }
        } else if (decoded.functionName === "aggregate3Value") {
            let total = 0n;
            for (const call of decoded.args[0]) {
                total += call.value;
                const outcome = this.execute(call.target, call.callData, call.value);
                if (!outcome.success && !call.allowFailure) {
                    throw revertError(outcome.returnData);
                }
                results.push(outcome);
            }
            if (total !== value) throw revertError("0x");
        } else {
            throw new Error(`unsupported multicall function: ${decoded.functionName}`);
        }

        return encodeAbiParameters(ABI.Multicall3.Primary.MulticallResults, [results]);
    }

    /** Executes a sub-call, an address without a contract succeeds with empty return data */
    execute(target: string, data: Hex, value: bigint): FakeCallOutcome {
        const contract = this.contracts.get(target.toLowerCase());
        if (!contract) return { success: true, returnData: "0x" };
        return contract({ data, value });
    }
}

function revertError(data: Hex) {
    return Object.assign(new Error("execution reverted"), { code: 3, data });
}
