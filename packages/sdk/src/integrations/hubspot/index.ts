export * from "./object-types.js";
export * from "./synthetic.js";
export * from "./schemas.js";
export * from "./actions.js";
