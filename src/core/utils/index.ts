export * from "./array";
export * from "./date";
export * from "./logger";
export * from "./retry";
export * from "./url";
