/**
 * Database module index
 */

export * from "./changes";
export * from "./connection";
export * from "./crawl-state";
export * from "./gateway";
export * from "./operations";
export * from "./schema";
