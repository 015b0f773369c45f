/*
 *  movement/index.ts — Barrel export for movement module
 *  hearthlight
 */

export { npcAt, adjacentNpc, adjacentDoor } from "./map-queries.js";
export { tryMovePlayer } from "./player-movement.js";
