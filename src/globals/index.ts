/*
 *  globals/index.ts — Barrel export for content catalogs
 *  hearthlight
 */

export * from "./item-catalog.js";
export * from "./npc-catalog.js";
export * from "./dialogue-catalog.js";
