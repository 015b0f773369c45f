/*
 *  dialogue/index.ts — Dialogue module barrel export
 *  hearthlight
 */

export * from "./dialogue.js";
export * from "./dialogue-choices.js";
export * from "./dialogue-chests.js";
