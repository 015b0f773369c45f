/*
 *  math/index.ts — Barrel export for random streams
 *  hearthlight
 */

export * from "./rng.js";
