export * from "./detector";
export * from "./report";
