export * from "./guards.js";
export * from "./request.js";
export * from "./attribute.js";
export * from "./errors.js";
export * from "./result.js";
