/*
 *  game/index.ts — Barrel exports for the game module
 *  hearthlight
 */

export { createWorld, placeNpcs, welcome } from "./game-init.js";
export type { WorldDeps } from "./game-init.js";
export { arrivalPosition, enterOtherLevel } from "./game-level.js";
export { applyAction, DOOR_LOCKED_HINT, NOTHING_NEARBY } from "./world-controller.js";
