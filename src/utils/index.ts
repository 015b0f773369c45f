/*
 *  utils/index.ts — Barrel export for configuration and errors
 *  hearthlight
 */

export * from "./errors.js";
export * from "./config.js";
