export * from "./fields";
export * from "./parser";
