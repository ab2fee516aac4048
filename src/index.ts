export * from "./common";
export * from "./codec";
export { CallItem } from "./call";
export type { CallItemParams } from "./call";
export { PreAssembledSpan, MulticallLogger, DEFAULT_TRACER_NAME } from "./logger";
export { MulticallOptions, MulticallOptionsError, MulticallOptionsErrorType } from "./config";
export { DynamicMulticall, MulticallError, MulticallErrorType } from "./multicall";
export type { CallResult, AggregateFunction, DynamicMulticallConfig } from "./multicall";
export {
    ErrorSeverity,
    errorSnapshot,
    tryDecodeError,
    decodeCallFailure,
    MulticallBaseError,
} from "./error";
export type { CallFailure, DecodedErrorType } from "./error";
export { RpcCallTransport, TransportError, TransportErrorType } from "./transport";
export type { CallTransport, SimulateCallRequest } from "./transport";
