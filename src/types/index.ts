export * from "./common.js";
export * from "./state.js";
