/*
 *  items/index.ts — Barrel export for inventory and item use
 *  hearthlight
 */

export * from "./item-inventory.js";
export * from "./item-usage.js";
