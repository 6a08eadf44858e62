export * from "./schemas.js";
export * from "./actions.js";
