export * from "./crawler";
export * from "./errors";
