/**
 * Type definitions index
 */

export * from "./change";
export * from "./crawl";
export * from "./database";
export * from "./entity";
