export * from "./yaml";
export * from "./error";
export * from "./validators";
