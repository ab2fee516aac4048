import { parseAbi, parseAbiParameters } from "viem";

const _Call3 = "(address target, bool allowFailure, bytes callData)" as const;
const _Call3Value = "(address target, bool allowFailure, uint256 value, bytes callData)" as const;
const _MulticallResult = "(bool success, bytes returnData)" as const;

const _multicall3 = [
    `function aggregate3(${_Call3}[] calldata calls) external payable returns (${_MulticallResult}[] memory returnData)`,
    `function aggregate3Value(${_Call3Value}[] calldata calls) external payable returns (${_MulticallResult}[] memory returnData)`,
] as const;

/** Keeps the Multicall3 contract ABIs */
export namespace Multicall3Abi {
    /**
     * Canonical Multicall3 deployment address, the same on every chain it
     * has been deployed to
     */
    export const Address = "0xcA11bde05977b3631167028862bE2a173976CA11" as const;

    /** Multicall3 contract primary parsed ABI */
    export namespace Primary {
        export const Multicall = parseAbi(_multicall3);
        /** Return parameters of aggregate3 and aggregate3Value */
        export const MulticallResults = parseAbiParameters(`${_MulticallResult}[]` as const);
    }
}
