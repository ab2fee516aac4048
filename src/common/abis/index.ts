import { Multicall3Abi } from "./multicall";

/** Keeps all necessary ABIs for dynamic multicall */
export namespace ABI {
    export import Multicall3 = Multicall3Abi;
}
