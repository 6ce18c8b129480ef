export * from "./interfaces";
export * from "./logger";
export * from "./node";
