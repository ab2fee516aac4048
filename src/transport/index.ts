import { TransportError, TransportErrorType } from "./error";
import { formatCallRequest, serializeBlockReference, serializeStateOverride } from "./helpers";
import { BlockReference, InputKind, StateOverrideSet } from "../common";
import {
    Hex,
    http,
    isHex,
    Chain,
    Address,
    Transport,
    EIP1193RequestFn,
    HttpTransportConfig,
} from "viem";

export * from "./error";
export * from "./helpers";

/** A single read-only simulated call */
export type SimulateCallRequest = {
    /** The destination address */
    to: Address;
    /** The call payload */
    input: Hex;
    /** The payload field convention */
    inputKind: InputKind;
    /** Optional native asset amount to simulate sending with the call */
    value?: bigint;
    /** Optional block the call is evaluated against, default is latest */
    block?: BlockReference;
    /** Optional call-scoped account overrides */
    stateOverride?: StateOverrideSet;
};

/**
 * Capability of performing a single read-only simulated call, resolves with
 * the raw return data or rejects with the transport error. Timeouts and
 * cancellation are owned by the implementation.
 */
export interface CallTransport {
    simulateCall(request: SimulateCallRequest): Promise<Hex>;
}

/**
 * A {@link CallTransport} that performs `eth_call` JSON-RPC requests through
 * any viem transport (http, webSocket, custom, fallback). Requests are not
 * retried by this transport, retry policy is left to the caller.
 *
 * @example
 * ```typescript
 * const transport = new RpcCallTransport(http("https://rpc.example.com"));
 * const data = await transport.simulateCall({ to, input, inputKind: "input" });
 * ```
 */
export class RpcCallTransport implements CallTransport {
    readonly request: EIP1193RequestFn;

    constructor(transport: Transport, chain?: Chain) {
        const { request } = transport({ chain, retryCount: 0 });
        this.request = request;
    }

    /**
     * Creates an instance that sends requests over http to the given rpc url
     * @param url - The rpc url
     * @param config - Optional http transport config, such as timeout or fetch options
     */
    static fromUrl(url: string, config?: HttpTransportConfig): RpcCallTransport {
        return new RpcCallTransport(http(url, config));
    }

    async simulateCall(request: SimulateCallRequest): Promise<Hex> {
        const params: unknown[] = [
            formatCallRequest(request.to, request.input, request.inputKind, request.value),
            serializeBlockReference(request.block),
        ];
        if (request.stateOverride) {
            params.push(serializeStateOverride(request.stateOverride));
        }
        const result = await this.request({ method: "eth_call", params });
        if (!isHex(result, { strict: true })) {
            throw new TransportError(
                `expected hex encoded return data, got: ${typeof result}`,
                TransportErrorType.InvalidResponse,
            );
        }
        return result;
    }
}
