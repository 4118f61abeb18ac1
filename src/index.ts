export * from "./analyzer/index.js";
