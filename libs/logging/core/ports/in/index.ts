export * from "./consistency-check.use-case";
