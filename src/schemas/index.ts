export * from "./records.js";
export * from "./bundle.js";
export * from "./export-target.js";
