/*
 *  types/index.ts — Barrel export for all type definitions
 *  hearthlight
 */

export * from "./constants.js";
export * from "./enums.js";
export * from "./types.js";
export * from "./actions.js";
export * from "./platform.js";
