export * from "./schemas.js";
export * from "./history.js";
export * from "./actions.js";
