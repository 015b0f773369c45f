/*
 *  state/index.ts — Barrel export for the World container
 *  hearthlight
 */

export * from "./game-state.js";
export * from "./snapshot.js";
