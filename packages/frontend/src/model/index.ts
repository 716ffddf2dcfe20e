/**
 * Declaration model - Public API
 */

export * from "./declaration.js";
export * from "./markers.js";
export * from "./roles.js";
