export * from "./asserts/index.js";
export * from "./client/index.js";
