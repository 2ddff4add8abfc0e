/** Domain types, errors and results. */

export * from "./types.js";
export * from "./errors.js";
export * from "./result.js";
export * from "./validation.js";
