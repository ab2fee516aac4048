export * from "./types";
export * from "./common";
export * from "./decoder";
