/*
 *  grid/index.ts — Barrel export for tile map operations
 *  hearthlight
 */

export * from "./grid.js";
