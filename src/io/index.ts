/*
 *  io/index.ts — Barrel export for the message log
 *  hearthlight
 */

export * from "./io-messages.js";
