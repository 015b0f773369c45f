/*
 *  hearthlight
 *  A seeded two-room dungeon simulation for the terminal
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 *
 *  This program is distributed in the hope that it will be useful,
 *  but WITHOUT ANY WARRANTY; without even the implied warranty of
 *  MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *  GNU Affero General Public License for more details.
 *
 *  You should have received a copy of the GNU Affero General Public License
 *  along with this program.  If not, see <http://www.gnu.org/licenses/>.
 */

// Top-level barrel exports for hearthlight.
//
// Hosts need only the foundation types plus the world entry points below.
// Everything else is grouped by module namespace.
//
// ── Foundation ──────────────────────────────────────────────────────────────
export * from "./types/index.js";
export * from "./math/index.js";
export * from "./utils/index.js";

// ── World entry points ──────────────────────────────────────────────────────
export { createWorld, applyAction } from "./game/index.js";
export type { WorldDeps } from "./game/index.js";
export { snapshotWorld } from "./state/index.js";
export type { World, WorldSnapshot, PlayerView } from "./state/index.js";

// ── Module namespaces ───────────────────────────────────────────────────────
export * as globals from "./globals/index.js";
export * as grid from "./grid/index.js";
export * as state from "./state/index.js";
export * as architect from "./architect/index.js";
export * as items from "./items/index.js";
export * as dialogue from "./dialogue/index.js";
export * as combat from "./combat/index.js";
export * as movement from "./movement/index.js";
export * as io from "./io/index.js";
export * as game from "./game/index.js";
export * as platform from "./platform/index.js";
