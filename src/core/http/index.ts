export * from "./fetcher";
