export * from "./abis";
export * from "./types";
export * from "./utils";
export * from "./result";
