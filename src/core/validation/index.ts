export * from "./entity-validator";
