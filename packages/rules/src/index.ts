// packages/rules/src/index.ts
export * from "./table.js";
export * from "./classifier.js";
export * from "./source.js";
