export * from "./catalog-service";
export * from "./jobs";
export * from "./queue";
