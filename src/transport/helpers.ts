import { Address, Hex, numberToHex } from "viem";
import { AccountOverride, BlockReference, InputKind, StateOverrideSet } from "../common";

/** The block parameter of a JSON-RPC call, a quantity, a tag or an EIP-1898 identifier */
export type RpcBlockIdentifier =
    | string
    | {
          blockHash: Hex;
          requireCanonical?: boolean;
      };

/** JSON-RPC form of a single account override */
export type RpcAccountOverride = {
    balance?: Hex;
    nonce?: Hex;
    code?: Hex;
    state?: Record<Hex, Hex>;
    stateDiff?: Record<Hex, Hex>;
};

/** JSON-RPC form of a state override set */
export type RpcStateOverride = Record<string, RpcAccountOverride>;

/** JSON-RPC form of a read call request */
export type RpcCallRequest = {
    to: Address;
    input?: Hex;
    data?: Hex;
    value?: Hex;
};

/**
 * Serializes the given block reference into the block parameter of a JSON-RPC
 * call, defaults to latest block
 * @param block - The block reference
 */
export function serializeBlockReference(block?: BlockReference): RpcBlockIdentifier {
    if (block === undefined) return "latest";
    if (typeof block === "bigint") return numberToHex(block);
    if (typeof block === "string") return block;
    const identifier: RpcBlockIdentifier = { blockHash: block.blockHash };
    if (block.requireCanonical !== undefined) {
        identifier.requireCanonical = block.requireCanonical;
    }
    return identifier;
}

/**
 * Serializes a single account override into its JSON-RPC form
 * @param override - The account override
 */
export function serializeAccountOverride(override: AccountOverride): RpcAccountOverride {
    const result: RpcAccountOverride = {};
    if (override.balance !== undefined) result.balance = numberToHex(override.balance);
    if (override.nonce !== undefined) result.nonce = numberToHex(override.nonce);
    if (override.code !== undefined) result.code = override.code;
    if (override.state !== undefined) result.state = { ...override.state };
    if (override.stateDiff !== undefined) result.stateDiff = { ...override.stateDiff };
    return result;
}

/**
 * Serializes the given state override set into the state override parameter of a JSON-RPC call
 * @param stateOverride - The state override set
 */
export function serializeStateOverride(stateOverride: StateOverrideSet): RpcStateOverride {
    const result: RpcStateOverride = {};
    for (const [address, override] of Object.entries(stateOverride)) {
        result[address.toLowerCase()] = serializeAccountOverride(override);
    }
    return result;
}

/**
 * Builds the transaction object of a JSON-RPC read call, placing the payload
 * in the field(s) the given input kind specifies
 * @param to - The destination address
 * @param input - The call payload
 * @param inputKind - The payload field convention
 * @param value - Optional native asset amount, omitted when zero
 */
export function formatCallRequest(
    to: Address,
    input: Hex,
    inputKind: InputKind,
    value?: bigint,
): RpcCallRequest {
    const request: RpcCallRequest = { to };
    if (inputKind === "input" || inputKind === "both") request.input = input;
    if (inputKind === "data" || inputKind === "both") request.data = input;
    if (value !== undefined && value > 0n) request.value = numberToHex(value);
    return request;
}
